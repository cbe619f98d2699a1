import type { MemoryBuffer } from '../buffer/types.js';
import type { CalendarBreakdown, LogRecord } from '../types.js';

export type DirectiveKind =
  | 'literal'
  | 'char'
  | 'loggerName'
  | 'level'
  | 'shortLevel'
  | 'threadId'
  | 'processId'
  | 'message'
  | 'messageId'
  | 'weekdayAbbrev'
  | 'weekdayFull'
  | 'monthAbbrev'
  | 'monthFull'
  | 'dateTime'
  | 'shortYear'
  | 'year'
  | 'shortDate'
  | 'month'
  | 'day'
  | 'hour24'
  | 'hour12'
  | 'minute'
  | 'second'
  | 'milliseconds'
  | 'microseconds'
  | 'nanoseconds'
  | 'amPm'
  | 'clock12'
  | 'clock24Short'
  | 'clock24'
  | 'utcOffset'
  | 'fullLine';

/** One compiled unit of a pattern. Immutable once created. */
export interface Directive {
  readonly kind: DirectiveKind;
  /** Minimum padded width; 0 when the pattern gave none or the kind ignores it. */
  readonly width: number;
  format(record: LogRecord, tm: CalendarBreakdown, dest: MemoryBuffer): void;
}

export interface LiteralDirective extends Directive {
  readonly kind: 'literal' | 'char';
  readonly text: string;
}
