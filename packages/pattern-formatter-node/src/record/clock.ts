const nanosPerMilli = 1_000_000n;

const wallClockAnchor = BigInt(Date.now()) * nanosPerMilli;
const monotonicAnchor = process.hrtime.bigint();

/**
 * Wall-clock nanoseconds since the Unix epoch. The wall clock is sampled once
 * at load; later readings advance with the monotonic clock, so timestamps never
 * go backwards within a process.
 */
export function nowNanoseconds(): bigint {
  return wallClockAnchor + (process.hrtime.bigint() - monotonicAnchor);
}

export function nanosecondsFromMillis(millis: number): bigint {
  return BigInt(Math.trunc(millis)) * nanosPerMilli;
}
