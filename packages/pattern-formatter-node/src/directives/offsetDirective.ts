import type { Logger } from '@glyphlog/service-framework-node';
import type { MemoryBuffer } from '../buffer/types.js';
import { pad2 } from '../numericText/numericText.js';
import type { TimezoneOffsetCache } from '../offsetCache/types.js';
import type { CalendarBreakdown } from '../types.js';
import type { Directive } from './types.js';

const PLUS = 0x2b;
const MINUS = 0x2d;
const COLON = 0x3a;

const maxOffsetMinutes = 24 * 60;

export interface UtcOffsetDirectiveOptions {
  cache: TimezoneOffsetCache;
  logger?: Logger;
  onRefresh?: () => void;
}

interface RefreshOutcome {
  refreshed: boolean;
  rejected?: number;
}

function readOffset(tm: CalendarBreakdown): number | undefined {
  const minutes = tm.utcOffsetMinutes;
  return Number.isInteger(minutes) && Math.abs(minutes) <= maxOffsetMinutes ? minutes : undefined;
}

export function appendUtcOffset(totalMinutes: number, dest: MemoryBuffer): void {
  dest.push(totalMinutes < 0 ? MINUS : PLUS);
  const magnitude = Math.abs(totalMinutes);
  pad2(Math.floor(magnitude / 60), dest);
  dest.push(COLON);
  pad2(magnitude % 60, dest);
}

/**
 * `±HH:MM`. The offset is read from the record's calendar breakdown at most
 * once per refresh window of the shared cache; an unusable value counts as 0.
 * Logging and refresh callbacks run after the cache lock is released.
 */
export function createUtcOffsetDirective(options: UtcOffsetDirectiveOptions): Directive {
  const { cache, logger, onRefresh } = options;

  return {
    kind: 'utcOffset',
    width: 0,
    format(record, tm, dest) {
      const refresh: RefreshOutcome = { refreshed: false };

      const minutes = cache.getOffsetMinutes(record.timestamp, () => {
        refresh.refreshed = true;
        const candidate = readOffset(tm);
        if (candidate === undefined) {
          refresh.rejected = tm.utcOffsetMinutes;
          return 0;
        }
        return candidate;
      });

      if (refresh.refreshed) {
        onRefresh?.();
      }
      if (refresh.rejected !== undefined) {
        logger?.warn('Calendar source returned an unusable UTC offset, using +00:00', {
          utcOffsetMinutes: refresh.rejected,
        });
      }

      appendUtcOffset(minutes, dest);
    },
  };
}
