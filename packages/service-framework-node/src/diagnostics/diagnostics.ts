import type {
  DiagnosticConfig,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
  LogWriteTarget,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const resetColor = '\x1b[0m';
const msgColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

function formatAsJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatAsHumanReadable(entry: LogEntry): string {
  const severityColor = severityColors[entry.severity];

  const parts: string[] = [
    `${severityColor}${entry.severity}${resetColor}`,
    `component=${msgColor}${entry.component}${resetColor}`,
    `ts=${msgColor}${entry.timestamp}${resetColor}`,
    `msg="${severityColor}${entry.message}${resetColor}"`,
  ];

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'object' ? JSON.stringify(value) : `"${value}"`;
      parts.push(`${key}=${severityColor}${serializedValue}${resetColor}`);
    }
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts: string[] = [
    `timestamp=${entry.timestamp}`,
    `component=${entry.component}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
      parts.push(`${key}=${serializedValue}`);
    }
  }

  return parts.join(' ');
}

export function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'json':
      return formatAsJson(entry);
    case 'human':
      return formatAsHumanReadable(entry);
    case 'structured-text':
      return formatAsStructuredText(entry);
    default:
      return formatAsJson(entry);
  }
}

const consoleWriteTarget: LogWriteTarget = (line, severity) => {
  if (severity === 'error' || severity === 'fatal') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function formatErrorAsParams(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      ...(error.name !== 'Error' ? { name: error.name } : {}),
      stack: error.stack,
      ...('toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
        ? error.toErrorPlainObject()
        : {}),
    };
  }

  return {
    error: String(error),
  };
}

/**
 * Creates the library's own diagnostic logger. `component` names the emitting
 * part of the library; children append a dotted scope (`formatter.compiler`).
 */
export function createLogger(component: string, config: DiagnosticConfig = {}): Logger {
  const minimumSeverityLevel = severityLevels[config.minimumSeverity ?? 'info'];
  const outputFormat = config.outputFormat ?? 'human';
  const write = config.write ?? consoleWriteTarget;
  const now = config.now ?? (() => new Date());

  function log(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityLevels[severity] < minimumSeverityLevel) {
      return;
    }

    const mergedFields = { ...config.defaultLoggerArgs, ...fields };

    const logEntry: LogEntry = {
      timestamp: now().toISOString(),
      severity,
      message,
      component,
      ...(Object.keys(mergedFields).length > 0 ? { fields: mergedFields } : {}),
    };

    write(formatLogEntry(logEntry, outputFormat), severity);
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalFields = typeof message === 'string' ? fields : message;
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? additionalMessage ?? String(error), {
      ...formatErrorAsParams(error),
      ...additionalFields,
      ...(typeof message === 'string' ? undefined : fields),
      ...(additionalMessage && errorMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug(message: string, fields?: Record<string, unknown>): void {
      log('debug', message, fields);
    },

    info(message: string, fields?: Record<string, unknown>): void {
      log('info', message, fields);
    },

    warn(message: string, fields?: Record<string, unknown>): void {
      log('warn', message, fields);
    },

    error(error, message, fields): void {
      logError('error', error, message, fields);
    },

    fatal(error, message, fields): void {
      logError('fatal', error, message, fields);
    },

    createChild(scope: string): Logger {
      return createLogger(`${component}${scopeDelimiter}${scope}`, config);
    },
  };
}
