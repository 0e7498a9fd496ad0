import type { GenerationKeyValues } from './route.js';
import { extractStaticLiteral } from './static-segments.js';

/**
 * Per route: generation key → the literal value the route demands, or
 * `undefined` when the route constrains the key but not to one value.
 */
export type PossibleKeys = ReadonlyArray<Readonly<Record<string, string | undefined>>>;

/**
 * Observes each route's generation keys and reports which keys best
 * discriminate the catalogue.
 *
 * The report is a histogram cut: keys whose frequency reaches one standard
 * deviation above the mean, most frequent first, ties in first-seen order.
 */
export class KeyFrequencyAnalyzer {
  private readonly observations: GenerationKeyValues[] = [];
  private possible: PossibleKeys | null = null;
  private cachedReport: readonly string[] | null = null;

  observe(keys: GenerationKeyValues): void {
    this.observations.push(keys);
    this.expire();
  }

  get possibleKeys(): PossibleKeys {
    if (!this.possible) {
      this.possible = this.observations.map((keys) => {
        const values: Record<string, string | undefined> = {};
        for (const [key, constraint] of Object.entries(keys)) {
          values[key] = typeof constraint === 'string' ? constraint : extractStaticLiteral(constraint);
        }
        return values;
      });
    }
    return this.possible;
  }

  report(): readonly string[] {
    if (this.cachedReport) return this.cachedReport;

    // Map iteration order is insertion order, which gives the stable tie-break.
    const frequency = new Map<string, number>();
    let count = 0;
    for (const keys of this.possibleKeys) {
      for (const key of Object.keys(keys)) {
        count++;
        frequency.set(key, (frequency.get(key) ?? 0) + 1);
      }
    }

    if (count <= 1) {
      this.cachedReport = [];
      return this.cachedReport;
    }

    const mean = Math.floor(count / frequency.size);
    let squares = 0;
    for (const value of frequency.values()) squares += (value - mean) ** 2;
    const upperLimit = mean + Math.sqrt(squares / count);

    this.cachedReport = [...frequency]
      .filter(([, value]) => value >= upperLimit)
      .sort(([, a], [, b]) => b - a)
      .map(([key]) => key);
    return this.cachedReport;
  }

  /** Drop cached tables; observations stay. */
  private expire(): void {
    this.possible = null;
    this.cachedReport = null;
  }
}
