import { EOL } from 'node:os';
import { createSystemCalendarSource } from '../calendar/calendarSource.js';
import { compilePattern } from '../compiler/patternCompiler.js';
import type { LineEnding, LogRecord } from '../types.js';
import type { PatternFormatter, PatternFormatterOptions } from './types.js';

export const defaultPattern = '%+';

const encoder = new TextEncoder();

const lineEndings: Record<LineEnding, Uint8Array> = {
  lf: encoder.encode('\n'),
  crlf: encoder.encode('\r\n'),
};

function platformLineEnding(): LineEnding {
  return EOL === '\r\n' ? 'crlf' : 'lf';
}

export function createPatternFormatter(options: PatternFormatterOptions = {}): PatternFormatter {
  const pattern = options.pattern ?? defaultPattern;
  const timeType = options.timeType ?? 'local';
  const eolBytes = lineEndings[options.eol ?? platformLineEnding()];
  const calendarSource = options.calendarSource ?? createSystemCalendarSource();
  const metrics = options.metrics;
  const logger = options.logger?.createChild('patternFormatter');

  const directives = compilePattern(pattern, {
    levelStrings: options.levelStrings,
    enableMessageCounter: options.enableMessageCounter,
    fullLine: options.fullLine,
    processId: options.processId,
    timeType,
    offsetCache: options.offsetCache,
    logger,
    metrics,
  });

  logger?.debug('Pattern compiled', { pattern, timeType, directives: directives.length });

  function format(record: LogRecord): void {
    const dest = record.formatted;
    const start = dest.size;
    const tm = calendarSource.breakdown(record.timestamp, timeType);

    for (const directive of directives) {
      directive.format(record, tm, dest);
    }
    dest.appendBytes(eolBytes);

    if (metrics) {
      metrics.formattedLines.inc();
      metrics.formattedLineBytes.observe(dest.size - start);
    }
  }

  return {
    pattern,
    timeType,
    directives,
    format,

    formatToString(record: LogRecord): string {
      const start = record.formatted.size;
      format(record);
      return record.formatted.toString(start);
    },
  };
}
