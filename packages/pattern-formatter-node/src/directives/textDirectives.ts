import { type LevelStrings, defaultLevelStrings } from '../level.js';
import { appendInt } from '../numericText/numericText.js';
import type { Directive, LiteralDirective } from './types.js';
import { padSpaceLeft, padSpaceRightInt } from './padding.js';

const HASH = 0x23;

const encoder = new TextEncoder();

export function createLiteralDirective(text: string): LiteralDirective {
  const bytes = encoder.encode(text);
  return {
    kind: 'literal',
    width: 0,
    text,
    format(_record, _tm, dest) {
      dest.appendBytes(bytes);
    },
  };
}

/** Single ASCII character; anything wider goes through `createLiteralDirective`. */
export function createCharDirective(char: string): LiteralDirective {
  const byte = char.charCodeAt(0);
  return {
    kind: 'char',
    width: 0,
    text: char,
    format(_record, _tm, dest) {
      dest.push(byte);
    },
  };
}

export function createLoggerNameDirective(width: number): Directive {
  return {
    kind: 'loggerName',
    width,
    format(record, _tm, dest) {
      padSpaceLeft(record.loggerName, width, dest);
    },
  };
}

export function createLevelDirective(
  width: number,
  levelStrings: LevelStrings = defaultLevelStrings,
): Directive {
  return {
    kind: 'level',
    width,
    format(record, _tm, dest) {
      padSpaceLeft(levelStrings.long[record.level] ?? String(record.level), width, dest);
    },
  };
}

export function createShortLevelDirective(
  width: number,
  levelStrings: LevelStrings = defaultLevelStrings,
): Directive {
  return {
    kind: 'shortLevel',
    width,
    format(record, _tm, dest) {
      padSpaceLeft(levelStrings.short[record.level] ?? String(record.level), width, dest);
    },
  };
}

export function createThreadIdDirective(width: number): Directive {
  return {
    kind: 'threadId',
    width,
    format(record, _tm, dest) {
      padSpaceRightInt(record.threadId, width, dest);
    },
  };
}

export function createProcessIdDirective(width: number, processId: number): Directive {
  return {
    kind: 'processId',
    width,
    format(_record, _tm, dest) {
      padSpaceRightInt(processId, width, dest);
    },
  };
}

export function createMessageDirective(): Directive {
  return {
    kind: 'message',
    width: 0,
    format(record, _tm, dest) {
      dest.appendString(record.message);
    },
  };
}

/** `#<id>`; records without an id render as `#0`. */
export function createMessageIdDirective(): Directive {
  return {
    kind: 'messageId',
    width: 0,
    format(record, _tm, dest) {
      dest.push(HASH);
      appendInt(record.messageId ?? 0, dest);
    },
  };
}
