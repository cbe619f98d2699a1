import type { MemoryBuffer } from './buffer/types.js';
import type { LogLevel } from './level.js';

export type PatternTimeType = 'local' | 'utc';

export type LineEnding = 'lf' | 'crlf';

export interface LogRecord {
  readonly loggerName: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly messageId?: number;
  readonly threadId: number;
  /** Nanoseconds since the Unix epoch. */
  readonly timestamp: bigint;
  readonly formatted: MemoryBuffer;
}

export interface CalendarBreakdown {
  readonly year: number;
  /** 0-11 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** 0 = Sunday */
  readonly weekday: number;
  /** Offset of this breakdown from UTC; always 0 for UTC breakdowns. */
  readonly utcOffsetMinutes: number;
}

export interface CalendarSource {
  breakdown(timestamp: bigint, timeType: PatternTimeType): CalendarBreakdown;
}
