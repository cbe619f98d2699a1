import type { PatternTimeType } from '../types.js';
import type { TimezoneOffsetCache, TimezoneOffsetCacheOptions } from './types.js';

export const defaultOffsetRefreshWindowMs = 5000;

const nanosPerMilli = 1_000_000n;

// Int32 slots
const LOCK = 0;
const FILLED = 1;
const OFFSET_MINUTES = 2;
const int32Slots = 4;

// BigInt64 slots, placed after the Int32 block
const LAST_REFRESH = 0;
const REFRESH_WINDOW = 1;
const bigIntSlots = 2;

const int32Bytes = int32Slots * Int32Array.BYTES_PER_ELEMENT;
const cellBytes = int32Bytes + bigIntSlots * BigInt64Array.BYTES_PER_ELEMENT;

/** Slot indices and sizes of the cell, for code that reads the buffer directly. */
export const offsetCacheLayout = Object.freeze({
  lock: LOCK,
  filled: FILLED,
  offsetMinutes: OFFSET_MINUTES,
  lastRefresh: LAST_REFRESH,
  refreshWindow: REFRESH_WINDOW,
  int32Slots,
  int32Bytes,
  bigIntSlots,
  byteLength: cellBytes,
});

const UNLOCKED = 0;
const LOCKED = 1;

function lock(state: Int32Array): void {
  while (Atomics.compareExchange(state, LOCK, UNLOCKED, LOCKED) !== UNLOCKED) {
    Atomics.wait(state, LOCK, LOCKED);
  }
}

function unlock(state: Int32Array): void {
  Atomics.store(state, LOCK, UNLOCKED);
  Atomics.notify(state, LOCK, 1);
}

/**
 * Creates the cell that caches the local UTC offset for `%z`.
 *
 * The cell lives in a `SharedArrayBuffer`. Passing `buffer` attaches to a cell
 * created elsewhere, typically by the main thread and handed to a worker
 * through `workerData`; the refresh window is then taken from that cell.
 */
export function createTimezoneOffsetCache(
  options: TimezoneOffsetCacheOptions = {},
): TimezoneOffsetCache {
  const attached = options.buffer !== undefined;
  const buffer = options.buffer ?? new SharedArrayBuffer(cellBytes);

  if (buffer.byteLength < cellBytes) {
    throw new RangeError(`Offset cache buffer must hold at least ${cellBytes} bytes`);
  }

  const state = new Int32Array(buffer, 0, int32Slots);
  const times = new BigInt64Array(buffer, int32Bytes, bigIntSlots);

  if (!attached) {
    const requestedMs = options.refreshWindowMs ?? defaultOffsetRefreshWindowMs;
    const refreshWindowMs = Number.isFinite(requestedMs)
      ? Math.max(0, Math.trunc(requestedMs))
      : defaultOffsetRefreshWindowMs;
    Atomics.store(times, REFRESH_WINDOW, BigInt(refreshWindowMs) * nanosPerMilli);
  }

  return {
    get refreshWindow() {
      return Atomics.load(times, REFRESH_WINDOW);
    },

    buffer,

    getOffsetMinutes(timestamp: bigint, compute: () => number): number {
      lock(state);
      try {
        const stale =
          state[FILLED] === 0 || timestamp - times[LAST_REFRESH] >= times[REFRESH_WINDOW];

        if (stale) {
          state[OFFSET_MINUTES] = compute();
          times[LAST_REFRESH] = timestamp;
          state[FILLED] = 1;
        }

        return state[OFFSET_MINUTES];
      } finally {
        unlock(state);
      }
    },
  };
}

const sharedCaches = new Map<PatternTimeType, TimezoneOffsetCache>();

/**
 * The process-wide cell used by formatters that are not given their own.
 * Local and UTC formatters never share a cell.
 */
export function getSharedTimezoneOffsetCache(
  timeType: PatternTimeType = 'local',
): TimezoneOffsetCache {
  let cache = sharedCaches.get(timeType);
  if (!cache) {
    cache = createTimezoneOffsetCache();
    sharedCaches.set(timeType, cache);
  }
  return cache;
}
