import { type LevelStrings, defaultLevelStrings } from '../level.js';
import { appendInt, pad2, pad3, timeFraction } from '../numericText/numericText.js';
import type { Directive } from './types.js';

const SPACE = 0x20;
const DASH = 0x2d;
const COLON = 0x3a;
const DOT = 0x2e;
const OPEN = 0x5b;
const CLOSE = 0x5d;

export interface FullLineOptions {
  includeDateTime?: boolean;
  includeLoggerName?: boolean;
}

/**
 * Renders `[%Y-%m-%d %H:%M:%S.%e] [%n] [%l] %v` in one pass, without
 * padding widths.
 */
export function createFullLineDirective(
  options: FullLineOptions = {},
  levelStrings: LevelStrings = defaultLevelStrings,
): Directive {
  const includeDateTime = options.includeDateTime ?? true;
  const includeLoggerName = options.includeLoggerName ?? true;

  return {
    kind: 'fullLine',
    width: 0,
    format(record, tm, dest) {
      if (includeDateTime) {
        dest.push(OPEN);
        appendInt(tm.year, dest);
        dest.push(DASH);
        pad2(tm.month + 1, dest);
        dest.push(DASH);
        pad2(tm.day, dest);
        dest.push(SPACE);
        pad2(tm.hour, dest);
        dest.push(COLON);
        pad2(tm.minute, dest);
        dest.push(COLON);
        pad2(tm.second, dest);
        dest.push(DOT);
        pad3(timeFraction(record.timestamp, 'ms'), dest);
        dest.push(CLOSE);
        dest.push(SPACE);
      }

      if (includeLoggerName) {
        dest.push(OPEN);
        dest.appendString(record.loggerName);
        dest.push(CLOSE);
        dest.push(SPACE);
      }

      dest.push(OPEN);
      dest.appendString(levelStrings.long[record.level] ?? String(record.level));
      dest.push(CLOSE);
      dest.push(SPACE);
      dest.appendString(record.message);
    },
  };
}
