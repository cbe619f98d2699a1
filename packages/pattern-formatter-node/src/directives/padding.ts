import type { MemoryBuffer } from '../buffer/types.js';
import { appendInt } from '../numericText/numericText.js';

const SPACE = 0x20;

/** Length in Unicode code points; a surrogate pair counts once. */
export function codePointLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
      }
    }
    count++;
  }
  return count;
}

export function appendSpaces(count: number, dest: MemoryBuffer): void {
  for (let i = 0; i < count; i++) {
    dest.push(SPACE);
  }
}

export function padSpaceLeft(text: string, width: number, dest: MemoryBuffer): void {
  if (width > 0) {
    appendSpaces(width - codePointLength(text), dest);
  }
  dest.appendString(text);
}

export function padSpaceRight(text: string, width: number, dest: MemoryBuffer): void {
  dest.appendString(text);
  if (width > 0) {
    appendSpaces(width - codePointLength(text), dest);
  }
}

export function padSpaceRightInt(n: number, width: number, dest: MemoryBuffer): void {
  const start = dest.size;
  appendInt(n, dest);
  appendSpaces(width - (dest.size - start), dest);
}
