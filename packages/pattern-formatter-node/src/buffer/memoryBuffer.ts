import type { MemoryBuffer } from './types.js';

const defaultInitialCapacity = 256;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// Worst case UTF-8 expansion of one UTF-16 code unit.
const maxBytesPerCodeUnit = 3;

export function createMemoryBuffer(initialCapacity = defaultInitialCapacity): MemoryBuffer {
  let bytes = new Uint8Array(Math.max(1, initialCapacity));
  let size = 0;

  function reserve(additional: number): void {
    const required = size + additional;
    if (required <= bytes.length) {
      return;
    }

    let capacity = bytes.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }

    const grown = new Uint8Array(capacity);
    grown.set(bytes.subarray(0, size));
    bytes = grown;
  }

  return {
    get size() {
      return size;
    },

    get capacity() {
      return bytes.length;
    },

    push(byte: number): void {
      reserve(1);
      bytes[size++] = byte;
    },

    appendBytes(chunk: Uint8Array): void {
      reserve(chunk.length);
      bytes.set(chunk, size);
      size += chunk.length;
    },

    appendString(text: string): void {
      if (text.length === 0) {
        return;
      }
      reserve(text.length * maxBytesPerCodeUnit);
      const { written } = encoder.encodeInto(text, bytes.subarray(size));
      size += written;
    },

    view(): Uint8Array {
      return bytes.subarray(0, size);
    },

    toBytes(): Uint8Array {
      return bytes.slice(0, size);
    },

    toString(start = 0): string {
      return decoder.decode(bytes.subarray(start, size));
    },

    clear(): void {
      size = 0;
    },
  };
}
