import type { CalendarBreakdown, CalendarSource, PatternTimeType } from '../types.js';

const nanosPerMilli = 1_000_000n;

function toDate(timestamp: bigint): Date {
  // Floor, so instants before the epoch land in the right second.
  let millis = timestamp / nanosPerMilli;
  if (timestamp < 0n && timestamp % nanosPerMilli !== 0n) {
    millis -= 1n;
  }
  return new Date(Number(millis));
}

function breakdownLocal(date: Date): CalendarBreakdown {
  return {
    year: date.getFullYear(),
    month: date.getMonth(),
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
    weekday: date.getDay(),
    utcOffsetMinutes: -date.getTimezoneOffset(),
  };
}

function breakdownUtc(date: Date): CalendarBreakdown {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth(),
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    weekday: date.getUTCDay(),
    utcOffsetMinutes: 0,
  };
}

/** Calendar source backed by `Date` and the process time zone (`TZ`). */
export function createSystemCalendarSource(): CalendarSource {
  return {
    breakdown(timestamp: bigint, timeType: PatternTimeType): CalendarBreakdown {
      const date = toDate(timestamp);
      return timeType === 'utc' ? breakdownUtc(date) : breakdownLocal(date);
    },
  };
}

export function createFixedCalendarSource(fields: Partial<CalendarBreakdown>): CalendarSource {
  const breakdown: CalendarBreakdown = {
    year: 1970,
    month: 0,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    weekday: 4,
    utcOffsetMinutes: 0,
    ...fields,
  };
  return {
    breakdown: () => breakdown,
  };
}
