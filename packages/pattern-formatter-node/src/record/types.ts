import type { MemoryBuffer } from '../buffer/types.js';
import type { LogLevel } from '../level.js';

export interface LogRecordInput {
  loggerName: string;
  level: LogLevel;
  message: string;
  messageId?: number;
  /** Defaults to `worker_threads.threadId`. */
  threadId?: number;
  /** Defaults to `nowNanoseconds()`. */
  timestamp?: bigint;
  formatted?: MemoryBuffer;
}

export interface MessageCounter {
  next(): number;
  readonly current: number;
}
