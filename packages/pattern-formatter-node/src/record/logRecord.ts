import { threadId as currentThreadId } from 'node:worker_threads';
import { createMemoryBuffer } from '../buffer/memoryBuffer.js';
import type { LogRecord } from '../types.js';
import { nowNanoseconds } from './clock.js';
import type { LogRecordInput, MessageCounter } from './types.js';

/** Ids start at 1; `current` is 0 until the first `next()`. */
export function createMessageCounter(): MessageCounter {
  let current = 0;

  return {
    next(): number {
      current += 1;
      return current;
    },

    get current() {
      return current;
    },
  };
}

export function createLogRecord(input: LogRecordInput): LogRecord {
  return {
    loggerName: input.loggerName,
    level: input.level,
    message: input.message,
    messageId: input.messageId,
    threadId: input.threadId ?? currentThreadId,
    timestamp: input.timestamp ?? nowNanoseconds(),
    formatted: input.formatted ?? createMemoryBuffer(),
  };
}
