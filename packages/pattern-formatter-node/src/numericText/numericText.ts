import type { MemoryBuffer } from '../buffer/types.js';

const ZERO = 0x30;
const MINUS = 0x2d;

export type FractionUnit = 'ms' | 'us' | 'ns';

// Above this, float division in pushDigits can no longer be trusted digit by digit.
const maxDirectMagnitude = 1e15;

const nanosPerSecond = 1_000_000_000n;

const nanosPerUnit: Record<FractionUnit, bigint> = {
  ms: 1_000_000n,
  us: 1_000n,
  ns: 1n,
};

function digitCount(n: number): number {
  let count = 1;
  while (n >= 10) {
    n = Math.floor(n / 10);
    count++;
  }
  return count;
}

function pushDigits(n: number, count: number, dest: MemoryBuffer): void {
  let divisor = 10 ** (count - 1);
  while (divisor >= 1) {
    dest.push(ZERO + (Math.floor(n / divisor) % 10));
    divisor /= 10;
  }
}

/**
 * Appends the decimal text of an integer. Digits are written straight into
 * `dest`; only bigints and non-integral numbers go through an intermediate string.
 */
export function appendInt(n: number | bigint, dest: MemoryBuffer): void {
  if (typeof n === 'bigint') {
    dest.appendString(n.toString());
    return;
  }
  if (!Number.isInteger(n) || Math.abs(n) >= maxDirectMagnitude) {
    dest.appendString(Number.isFinite(n) ? Math.trunc(n).toString() : String(n));
    return;
  }

  if (n < 0) {
    dest.push(MINUS);
    n = -n;
  }
  pushDigits(n, digitCount(n), dest);
}

/**
 * Signed zero padding to `width` characters, the sign included
 * (`-5` at width 3 is `-05`). Wider values are never cut.
 */
export function appendZeroPadded(n: number, width: number, dest: MemoryBuffer): void {
  if (!Number.isInteger(n) || Math.abs(n) >= maxDirectMagnitude) {
    appendInt(n, dest);
    return;
  }

  const magnitude = Math.abs(n);
  const digits = digitCount(magnitude);
  const signWidth = n < 0 ? 1 : 0;

  if (n < 0) {
    dest.push(MINUS);
  }
  for (let i = digits + signWidth; i < width; i++) {
    dest.push(ZERO);
  }
  pushDigits(magnitude, digits, dest);
}

export function pad2(n: number, dest: MemoryBuffer): void {
  if (n > 99) {
    appendInt(n, dest);
    return;
  }
  if (n > 9) {
    dest.push(ZERO + Math.floor(n / 10));
    dest.push(ZERO + (n % 10));
    return;
  }
  if (n >= 0) {
    dest.push(ZERO);
    dest.push(ZERO + n);
    return;
  }
  appendZeroPadded(n, 2, dest);
}

export function pad3(n: number, dest: MemoryBuffer): void {
  if (n > 999) {
    appendInt(n, dest);
    return;
  }
  if (n > 99) {
    dest.push(ZERO + Math.floor(n / 100));
    pad2(n % 100, dest);
    return;
  }
  if (n > 9) {
    dest.push(ZERO);
    dest.push(ZERO + Math.floor(n / 10));
    dest.push(ZERO + (n % 10));
    return;
  }
  if (n >= 0) {
    dest.push(ZERO);
    dest.push(ZERO);
    dest.push(ZERO + n);
    return;
  }
  appendZeroPadded(n, 3, dest);
}

export function pad6(n: number, dest: MemoryBuffer): void {
  if (n > 99_999) {
    appendInt(n, dest);
    return;
  }
  if (n < 0) {
    appendZeroPadded(n, 6, dest);
    return;
  }
  pad3(Math.floor(n / 1000), dest);
  pad3(n % 1000, dest);
}

export function pad9(n: number, dest: MemoryBuffer): void {
  if (n > 999_999_999) {
    appendInt(n, dest);
    return;
  }
  if (n < 0) {
    appendZeroPadded(n, 9, dest);
    return;
  }
  pad3(Math.floor(n / 1_000_000), dest);
  pad6(n % 1_000_000, dest);
}

/**
 * Sub-second part of a nanosecond timestamp, truncated to `unit`.
 * Truncation is toward zero, so timestamps before the epoch yield a
 * non-positive fraction.
 */
export function timeFraction(timestamp: bigint, unit: FractionUnit): number {
  const perUnit = nanosPerUnit[unit];
  const seconds = timestamp / nanosPerSecond;
  return Number(timestamp / perUnit - (seconds * nanosPerSecond) / perUnit);
}
