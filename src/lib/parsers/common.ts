export const MIN_SIGNAL_LEVEL = -128;
export const MAX_SIGNAL_LEVEL = 127;

const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * Parses a signal level token into an integer clamped to [-128, 127].
 * Returns null when the token is not an integer.
 */
export function parseSignalLevel(token: string): number | null {
  const value = token.trim();
  if (!INTEGER_REGEX.test(value)) {
    return null;
  }
  const level = parseInt(value, 10);
  return Math.min(MAX_SIGNAL_LEVEL, Math.max(MIN_SIGNAL_LEVEL, level));
}

export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter((token) => token !== '');
}

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/);
}
