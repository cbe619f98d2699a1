import { describe, expect, it } from 'vitest';
import { createFixedCalendarSource } from '../calendar/calendarSource.js';
import { LogLevel } from '../level.js';
import { createLogRecord } from '../record/logRecord.js';
import type { LogRecordInput } from '../record/types.js';
import {
  createCharDirective,
  createLevelDirective,
  createLiteralDirective,
  createMessageDirective,
  createMessageIdDirective,
  createShortLevelDirective,
  createThreadIdDirective,
} from './textDirectives.js';
import type { Directive } from './types.js';

const tm = createFixedCalendarSource({}).breakdown(0n, 'utc');

function render(directive: Directive, input: Partial<LogRecordInput> = {}): string {
  const record = createLogRecord({
    loggerName: 'text',
    level: LogLevel.warn,
    message: 'payload',
    threadId: 9,
    timestamp: 0n,
    ...input,
  });
  directive.format(record, tm, record.formatted);
  return record.formatted.toString();
}

describe('text directives', () => {
  it('should copy literals verbatim', () => {
    expect(render(createLiteralDirective('» ok'))).toBe('» ok');
    expect(render(createCharDirective('|'))).toBe('|');
  });

  it('should render the level names from the default table', () => {
    expect(render(createLevelDirective(0))).toBe('warning');
    expect(render(createShortLevelDirective(3), { level: LogLevel.off })).toBe('  O');
  });

  it('should fall back to the numeric level outside the table', () => {
    const unknownLevel: number = 9;

    expect(render(createLevelDirective(0), { level: unknownLevel })).toBe('9');
  });

  it('should write the message without padding', () => {
    expect(render(createMessageDirective(), { message: 'a\tb' })).toBe('a\tb');
  });

  it('should render thread ids', () => {
    expect(render(createThreadIdDirective(0))).toBe('9');
  });

  it('should render message ids with a hash and #0 when missing', () => {
    expect(render(createMessageIdDirective(), { messageId: 314 })).toBe('#314');
    expect(render(createMessageIdDirective())).toBe('#0');
  });
});
