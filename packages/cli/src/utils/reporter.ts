import pc from 'picocolors';

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Check if silent mode is enabled via flag or environment variable
 */
export function isSilent(argv: string[], env: NodeJS.ProcessEnv): boolean {
  return argv.includes('--silent') || env.WAYMARK_SILENT === '1';
}

/**
 * Check if colors should be used
 */
export function useColor(argv: string[], env: NodeJS.ProcessEnv): boolean {
  if (argv.includes('--no-color')) {
    return false;
  }

  // NO_COLOR is the cross-tool standard
  if (env.NO_COLOR !== undefined) {
    return false;
  }

  if (env.FORCE_COLOR !== undefined) {
    return true;
  }

  // Default to picocolors' detection (checks TTY)
  return pc.isColorSupported;
}

export function colors(enabled: boolean): Colors {
  return pc.createColors(enabled);
}
