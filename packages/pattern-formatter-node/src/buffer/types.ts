/**
 * Append-only, growable byte container. The caller owns it for the duration
 * of a format call and decides when to hand the bytes to a sink.
 */
export interface MemoryBuffer {
  readonly size: number;
  readonly capacity: number;
  push(byte: number): void;
  appendBytes(chunk: Uint8Array): void;
  /** Appends the UTF-8 encoding of `text`. */
  appendString(text: string): void;
  /** Live view of the written bytes; invalidated by the next append that grows the buffer. */
  view(): Uint8Array;
  toBytes(): Uint8Array;
  /** Decodes the bytes written from `start` onwards. */
  toString(start?: number): string;
  clear(): void;
}
