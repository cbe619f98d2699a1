import type { MemoryBuffer } from '../buffer/types.js';
import { appendInt, pad2, pad3, pad6, pad9, timeFraction } from '../numericText/numericText.js';
import type { CalendarBreakdown, LogRecord } from '../types.js';
import {
  type EncodedName,
  monthAbbrevNames,
  monthFullNames,
  weekdayAbbrevNames,
  weekdayFullNames,
} from './calendarNames.js';
import { appendSpaces } from './padding.js';
import type { Directive, DirectiveKind } from './types.js';

const SPACE = 0x20;
const COLON = 0x3a;
const SLASH = 0x2f;

const encoder = new TextEncoder();
const amBytes = encoder.encode('AM');
const pmBytes = encoder.encode('PM');

type CalendarFormat = (tm: CalendarBreakdown, dest: MemoryBuffer, record: LogRecord) => void;

function calendarDirective(kind: DirectiveKind, write: CalendarFormat): Directive {
  return {
    kind,
    width: 0,
    format(record, tm, dest) {
      write(tm, dest, record);
    },
  };
}

/** Midnight maps to 12; afternoon hours drop by 12. */
export function to12h(hour: number): number {
  if (hour > 12) {
    return hour - 12;
  }
  return hour === 0 ? 12 : hour;
}

function appendAmPm(tm: CalendarBreakdown, dest: MemoryBuffer): void {
  dest.appendBytes(tm.hour >= 12 ? pmBytes : amBytes);
}

function appendName(
  names: readonly EncodedName[],
  index: number,
  width: number,
  dest: MemoryBuffer,
): void {
  const name: EncodedName | undefined = names[index];
  if (name === undefined) {
    appendInt(index, dest);
    return;
  }
  dest.appendBytes(name.bytes);
  appendSpaces(width - name.length, dest);
}

function joinPadded(first: number, second: number, separator: number, dest: MemoryBuffer): void {
  pad2(first, dest);
  dest.push(separator);
  pad2(second, dest);
}

function joinPadded3(
  first: number,
  second: number,
  third: number,
  separator: number,
  dest: MemoryBuffer,
): void {
  joinPadded(first, second, separator, dest);
  dest.push(separator);
  pad2(third, dest);
}

function namedDirective(
  kind: DirectiveKind,
  names: readonly EncodedName[],
  field: 'weekday' | 'month',
  width: number,
): Directive {
  return {
    kind,
    width,
    format(_record, tm, dest) {
      appendName(names, tm[field], width, dest);
    },
  };
}

export const createWeekdayAbbrevDirective = (width: number) =>
  namedDirective('weekdayAbbrev', weekdayAbbrevNames, 'weekday', width);

export const createWeekdayFullDirective = (width: number) =>
  namedDirective('weekdayFull', weekdayFullNames, 'weekday', width);

export const createMonthAbbrevDirective = (width: number) =>
  namedDirective('monthAbbrev', monthAbbrevNames, 'month', width);

export const createMonthFullDirective = (width: number) =>
  namedDirective('monthFull', monthFullNames, 'month', width);

/** `Wed Aug 23 15:35:46 2014`; the day is not padded. */
export const createDateTimeDirective = () =>
  calendarDirective('dateTime', (tm, dest) => {
    appendName(weekdayAbbrevNames, tm.weekday, 0, dest);
    dest.push(SPACE);
    appendName(monthAbbrevNames, tm.month, 0, dest);
    dest.push(SPACE);
    appendInt(tm.day, dest);
    dest.push(SPACE);
    joinPadded3(tm.hour, tm.minute, tm.second, COLON, dest);
    dest.push(SPACE);
    appendInt(tm.year, dest);
  });

export const createShortYearDirective = () =>
  calendarDirective('shortYear', (tm, dest) => pad2(tm.year % 100, dest));

export const createYearDirective = () =>
  calendarDirective('year', (tm, dest) => appendInt(tm.year, dest));

/** `MM/DD/YY` */
export const createShortDateDirective = () =>
  calendarDirective('shortDate', (tm, dest) =>
    joinPadded3(tm.month + 1, tm.day, tm.year % 100, SLASH, dest),
  );

export const createMonthDirective = () =>
  calendarDirective('month', (tm, dest) => pad2(tm.month + 1, dest));

export const createDayDirective = () => calendarDirective('day', (tm, dest) => pad2(tm.day, dest));

export const createHour24Directive = () =>
  calendarDirective('hour24', (tm, dest) => pad2(tm.hour, dest));

export const createHour12Directive = () =>
  calendarDirective('hour12', (tm, dest) => pad2(to12h(tm.hour), dest));

export const createMinuteDirective = () =>
  calendarDirective('minute', (tm, dest) => pad2(tm.minute, dest));

export const createSecondDirective = () =>
  calendarDirective('second', (tm, dest) => pad2(tm.second, dest));

export const createMillisecondsDirective = () =>
  calendarDirective('milliseconds', (_tm, dest, record) =>
    pad3(timeFraction(record.timestamp, 'ms'), dest),
  );

export const createMicrosecondsDirective = () =>
  calendarDirective('microseconds', (_tm, dest, record) =>
    pad6(timeFraction(record.timestamp, 'us'), dest),
  );

export const createNanosecondsDirective = () =>
  calendarDirective('nanoseconds', (_tm, dest, record) =>
    pad9(timeFraction(record.timestamp, 'ns'), dest),
  );

export const createAmPmDirective = () => calendarDirective('amPm', appendAmPm);

/** `hh:mm:ss AM` */
export const createClock12Directive = () =>
  calendarDirective('clock12', (tm, dest) => {
    joinPadded3(to12h(tm.hour), tm.minute, tm.second, COLON, dest);
    dest.push(SPACE);
    appendAmPm(tm, dest);
  });

/** `HH:MM` */
export const createClock24ShortDirective = () =>
  calendarDirective('clock24Short', (tm, dest) => joinPadded(tm.hour, tm.minute, COLON, dest));

/** `HH:MM:SS` */
export const createClock24Directive = () =>
  calendarDirective('clock24', (tm, dest) =>
    joinPadded3(tm.hour, tm.minute, tm.second, COLON, dest),
  );
