export interface EncodedName {
  readonly text: string;
  readonly bytes: Uint8Array;
  readonly length: number;
}

const encoder = new TextEncoder();

function encodeNames(names: readonly string[]): readonly EncodedName[] {
  return Object.freeze(
    names.map((text) => Object.freeze({ text, bytes: encoder.encode(text), length: text.length })),
  );
}

export const weekdayAbbrevNames = encodeNames(['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat']);

export const weekdayFullNames = encodeNames([
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
]);

export const monthAbbrevNames = encodeNames([
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'June',
  'July',
  'Aug',
  'Sept',
  'Oct',
  'Nov',
  'Dec',
]);

export const monthFullNames = encodeNames([
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
]);
