// ─── Containers ───────────────────────────────────────────────────────────────

interface Leaf<T> {
  kind: 'leaf';
  items: T[];
}

/**
 * One level of the graph. `fallback` is the wildcard edge: it holds every
 * item that does not constrain this level's key, and seeds new edges.
 */
interface Branch<T> {
  kind: 'branch';
  edges: Map<string, Container<T>>;
  fallback: Container<T>;
}

type Container<T> = Leaf<T> | Branch<T>;

/** Key path of an item: a literal per level, `null` for "any value". */
export type KeyPath = ReadonlyArray<string | null>;

/** Plain-object view of a graph, for inspection and comparison. */
export type GraphShape =
  | string[]
  | { edges: Record<string, GraphShape>; fallback: GraphShape };

function createLeaf<T>(): Leaf<T> {
  return { kind: 'leaf', items: [] };
}

function clone<T>(container: Container<T>): Container<T> {
  if (container.kind === 'leaf') {
    return { kind: 'leaf', items: [...container.items] };
  }
  const edges = new Map<string, Container<T>>();
  for (const [key, child] of container.edges) edges.set(key, clone(child));
  return { kind: 'branch', edges, fallback: clone(container.fallback) };
}

function appendAll<T>(container: Container<T>, item: T): void {
  if (container.kind === 'leaf') {
    container.items.push(item);
    return;
  }
  for (const child of container.edges.values()) appendAll(child, item);
  appendAll(container.fallback, item);
}

function store<T>(container: Container<T>, path: KeyPath, item: T): Container<T> {
  if (path.length === 0) {
    appendAll(container, item);
    return container;
  }

  const [key, ...rest] = path;
  const branch: Branch<T> =
    container.kind === 'branch'
      ? container
      : { kind: 'branch', edges: new Map(), fallback: container };

  if (key === null) {
    for (const [edge, child] of branch.edges) {
      branch.edges.set(edge, store(child, rest, item));
    }
    branch.fallback = store(branch.fallback, rest, item);
  } else {
    // A new edge starts from everything already reachable through the wildcard.
    const child = branch.edges.get(key) ?? clone(branch.fallback);
    branch.edges.set(key, store(child, rest, item));
  }

  return branch;
}

function shapeOf<T>(container: Container<T>, label: (item: T) => string): GraphShape {
  if (container.kind === 'leaf') return container.items.map(label);
  const edges: Record<string, GraphShape> = {};
  for (const [key, child] of container.edges) edges[key] = shapeOf(child, label);
  return { edges, fallback: shapeOf(container.fallback, label) };
}

// ─── Graph ────────────────────────────────────────────────────────────────────

/**
 * Nested lookup keyed by stringified generation-key values, one level per key.
 *
 * Leaves hold candidates in insertion order. Every item is reachable from
 * every combination of its literal values and any value for the keys it
 * leaves open.
 */
export class GenerationGraph<T> {
  private root: Container<T> = createLeaf();

  /**
   * Build a graph from items in registration order. `keyPath` returns the
   * item's values per key, or `null` to leave the item out.
   */
  static build<T>(
    items: readonly T[],
    keyPath: (item: T, index: number) => KeyPath | null,
  ): GenerationGraph<T> {
    const graph = new GenerationGraph<T>();
    items.forEach((item, index) => {
      const path = keyPath(item, index);
      if (path) graph.insert(path, item);
    });
    return graph;
  }

  insert(path: KeyPath, item: T): void {
    // Trailing wildcards would only add levels every lookup falls through.
    let end = path.length;
    while (end > 0 && path[end - 1] === null) end--;
    this.root = store(this.root, path.slice(0, end), item);
  }

  /**
   * Candidates for the given values. `null` (or a missing trailing value)
   * takes the wildcard edge, as does a value with no edge of its own.
   */
  lookup(values: ReadonlyArray<string | null>): readonly T[] {
    let container = this.root;
    let level = 0;
    while (container.kind === 'branch') {
      const value = level < values.length ? values[level] : null;
      container = (value !== null ? container.edges.get(value) : undefined) ?? container.fallback;
      level++;
    }
    return container.items;
  }

  shape(label: (item: T) => string): GraphShape {
    return shapeOf(this.root, label);
  }
}
