export enum LogLevel {
  trace = 0,
  debug = 1,
  info = 2,
  warn = 3,
  err = 4,
  critical = 5,
  off = 6,
}

/** Full and short display names, indexed by `LogLevel`. */
export interface LevelStrings {
  readonly long: readonly string[];
  readonly short: readonly string[];
}

export const defaultLevelStrings: LevelStrings = Object.freeze({
  long: Object.freeze(['trace', 'debug', 'info', 'warning', 'error', 'critical', 'off']),
  short: Object.freeze(['T', 'D', 'I', 'W', 'E', 'C', 'O']),
});

export function levelToString(level: LogLevel, strings: LevelStrings = defaultLevelStrings): string {
  return strings.long[level] ?? String(level);
}

export function levelToShortString(
  level: LogLevel,
  strings: LevelStrings = defaultLevelStrings,
): string {
  return strings.short[level] ?? String(level);
}
