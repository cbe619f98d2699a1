export interface TimezoneOffsetCacheOptions {
  refreshWindowMs?: number;
  buffer?: SharedArrayBuffer;
}

export interface TimezoneOffsetCache {
  /** Nanoseconds a cached offset stays valid, measured on record timestamps. */
  readonly refreshWindow: bigint;
  readonly buffer: SharedArrayBuffer;
  /**
   * Returns the cached offset in minutes, calling `compute` under the lock when
   * the cell is empty or `timestamp` is at least one refresh window past the
   * last refresh. `compute` must not call back into the same cache.
   */
  getOffsetMinutes(timestamp: bigint, compute: () => number): number;
}
