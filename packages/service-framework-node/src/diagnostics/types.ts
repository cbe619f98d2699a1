export type LogSeverity = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogOutputFormat = 'json' | 'human' | 'structured-text';

export type LogWriteTarget = (line: string, severity: LogSeverity) => void;

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  fatal(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  createChild(scope: string): Logger;
}

export interface LogEntry {
  timestamp: string;
  severity: LogSeverity;
  message: string;
  component: string;
  fields?: Record<string, unknown>;
}

export interface DiagnosticConfig {
  minimumSeverity?: LogSeverity;
  outputFormat?: LogOutputFormat;
  defaultLoggerArgs?: Record<string, unknown>;
  /**
   * Where rendered lines go. Defaults to `console.log`, or `console.error`
   * for error and fatal entries.
   */
  write?: LogWriteTarget;
  now?: () => Date;
}
