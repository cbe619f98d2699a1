import type { Logger } from '@glyphlog/service-framework-node';
import type { FormatterChain } from '../compiler/types.js';
import type { FullLineOptions } from '../directives/fullLineDirective.js';
import type { LevelStrings } from '../level.js';
import type { PatternFormatterMetrics } from '../metrics/formatterMetrics.js';
import type { TimezoneOffsetCache } from '../offsetCache/types.js';
import type { CalendarSource, LineEnding, LogRecord, PatternTimeType } from '../types.js';

export interface PatternFormatterOptions {
  /** Defaults to `%+`. */
  pattern?: string;
  /** Defaults to `local`. */
  timeType?: PatternTimeType;
  /** Defaults to the platform line ending. */
  eol?: LineEnding;
  enableMessageCounter?: boolean;
  fullLine?: FullLineOptions;
  levelStrings?: LevelStrings;
  processId?: number;
  calendarSource?: CalendarSource;
  offsetCache?: TimezoneOffsetCache;
  logger?: Logger;
  metrics?: PatternFormatterMetrics;
}

export interface PatternFormatter {
  readonly pattern: string;
  readonly timeType: PatternTimeType;
  readonly directives: FormatterChain;
  /** Appends the rendered line, line ending included, to `record.formatted`. */
  format(record: LogRecord): void;
  /** Formats into the record's buffer and decodes only the appended bytes. */
  formatToString(record: LogRecord): string;
}
