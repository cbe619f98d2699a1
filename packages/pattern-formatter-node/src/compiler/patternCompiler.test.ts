import { createMockEnvContext, createMockLogger } from '@glyphlog/service-framework-node/test';
import { describe, expect, it } from 'vitest';
import { createMemoryBuffer } from '../buffer/memoryBuffer.js';
import { createFixedCalendarSource } from '../calendar/calendarSource.js';
import type { Directive, LiteralDirective } from '../directives/types.js';
import { LogLevel } from '../level.js';
import { createPatternFormatterMetrics } from '../metrics/formatterMetrics.js';
import { createTimezoneOffsetCache } from '../offsetCache/timezoneOffsetCache.js';
import { createLogRecord } from '../record/logRecord.js';
import type { CalendarBreakdown } from '../types.js';
import { compilePattern, maxFieldWidth } from './patternCompiler.js';
import type { CompileOptions, FormatterChain } from './types.js';

const tm: CalendarBreakdown = createFixedCalendarSource({
  year: 2024,
  month: 2,
  day: 5,
  hour: 14,
  minute: 7,
  second: 9,
  weekday: 2,
}).breakdown(0n, 'utc');

function render(chain: FormatterChain, message = 'hello'): string {
  const record = createLogRecord({
    loggerName: 'worker',
    level: LogLevel.info,
    message,
    threadId: 12,
    timestamp: 1_709_647_629_123_456_789n,
    formatted: createMemoryBuffer(),
  });
  for (const directive of chain) {
    directive.format(record, tm, record.formatted);
  }
  return record.formatted.toString();
}

function compileAndRender(pattern: string, options: CompileOptions = {}): string {
  return render(compilePattern(pattern, { processId: 4321, ...options }));
}

function isLiteral(directive: Directive | undefined): directive is LiteralDirective {
  return directive?.kind === 'literal' || directive?.kind === 'char';
}

function literalText(chain: FormatterChain, index: number): string | undefined {
  const directive = chain[index];
  return isLiteral(directive) ? directive.text : undefined;
}

describe('compilePattern', () => {
  it('should compile date fields with literal separators', () => {
    const chain = compilePattern('%Y-%m-%d');

    expect(chain.map((directive) => directive.kind)).toEqual([
      'year',
      'char',
      'month',
      'char',
      'day',
    ]);
    expect(render(chain)).toBe('2024-03-05');
  });

  it('should keep multi-character literal runs together', () => {
    const chain = compilePattern('at: %v -> done');

    expect(chain.map((directive) => directive.kind)).toEqual(['literal', 'message', 'literal']);
    expect(literalText(chain, 0)).toBe('at: ');
    expect(literalText(chain, 2)).toBe(' -> done');
  });

  it('should use a literal directive for a single non-ASCII character', () => {
    const chain = compilePattern('%v→');

    expect(chain[1]?.kind).toBe('literal');
    expect(render(chain)).toBe('hello→');
  });

  it('should render level and name around a literal colon', () => {
    expect(compileAndRender('%l:%n')).toBe('info:worker');
  });

  it('should produce an empty chain for an empty pattern', () => {
    expect(compilePattern('')).toEqual([]);
  });

  it('should return a frozen chain', () => {
    expect(Object.isFrozen(compilePattern('%v'))).toBe(true);
  });

  describe('trailing percent', () => {
    it.each([
      ['[%l] %v%', '[%l] %v'],
      ['[%l] %v%12', '[%l] %v'],
      ['%', ''],
    ])('should drop the trailing percent of %j', (pattern, trimmed) => {
      expect(compileAndRender(pattern)).toBe(compileAndRender(trimmed));
    });
  });

  describe('unknown selectors', () => {
    it('should echo an unknown selector with its width digits', () => {
      const chain = compilePattern('%3Q');

      expect(chain).toHaveLength(1);
      expect(chain[0]?.kind).toBe('literal');
      expect(render(chain)).toBe('%3Q');
    });

    it('should echo a doubled percent as written', () => {
      expect(compileAndRender('100%%')).toBe('100%%');
    });

    it('should log and count unknown selectors', async () => {
      const logger = createMockLogger();
      const metricsContext = createPatternFormatterMetrics(
        createMockEnvContext({ PROCESS_NAME: 'compiler-test' }),
      );

      compilePattern('%Q %5W', { logger, metrics: metricsContext.metrics });

      expect(logger.debug).toHaveBeenCalledWith(
        'Unknown pattern directive rendered as literal text',
        { directive: '%Q' },
      );
      expect(logger.debug).toHaveBeenCalledWith(
        'Unknown pattern directive rendered as literal text',
        { directive: '%5W' },
      );
      const counter = await metricsContext.metrics.unknownDirectives.get();
      expect(counter.values[0]?.value).toBe(2);
    });
  });

  describe('widths', () => {
    it('should left-pad names to the requested width', () => {
      expect(compileAndRender('[%8n]')).toBe('[  worker]');
      expect(compileAndRender('[%6l]')).toBe('[  info]');
    });

    it('should right-pad numeric and calendar name fields', () => {
      expect(compileAndRender('[%5t][%6P]')).toBe('[12   ][4321  ]');
      expect(compileAndRender('[%5a][%6b]')).toBe('[Tue  ][Mar   ]');
    });

    it('should never truncate a value wider than the width', () => {
      expect(compileAndRender('%2n')).toBe('worker');
    });

    it('should clamp absurd widths', () => {
      const chain = compilePattern('%99999n');

      expect(chain[0]?.width).toBe(maxFieldWidth);
      expect(render(chain)).toHaveLength(maxFieldWidth);
    });

    it('should parse widths of several digits', () => {
      expect(compilePattern('%012n')[0]?.width).toBe(12);
    });
  });

  describe('selectors', () => {
    it.each([
      ['%n', 'worker'],
      ['%l', 'info'],
      ['%L', 'I'],
      ['%t', '12'],
      ['%P', '4321'],
      ['%v', 'hello'],
      ['%a', 'Tue'],
      ['%A', 'Tuesday'],
      ['%b', 'Mar'],
      ['%h', 'Mar'],
      ['%B', 'March'],
      ['%c', 'Tue Mar 5 14:07:09 2024'],
      ['%C', '24'],
      ['%Y', '2024'],
      ['%D', '03/05/24'],
      ['%x', '03/05/24'],
      ['%m', '03'],
      ['%d', '05'],
      ['%H', '14'],
      ['%I', '02'],
      ['%M', '07'],
      ['%S', '09'],
      ['%e', '123'],
      ['%f', '123456'],
      ['%F', '123456789'],
      ['%p', 'PM'],
      ['%r', '02:07:09 PM'],
      ['%R', '14:07'],
      ['%T', '14:07:09'],
      ['%X', '14:07:09'],
      ['%z', '+00:00'],
    ])('should render %s as %s', (pattern, expected) => {
      expect(compileAndRender(pattern, { offsetCache: createTimezoneOffsetCache() })).toBe(
        expected,
      );
    });

    it('should default the process id to the current process', () => {
      expect(render(compilePattern('%P'))).toBe(String(process.pid));
    });

    it('should treat %i as unknown unless the message counter is enabled', () => {
      expect(compileAndRender('%i')).toBe('%i');
      expect(compileAndRender('%i', { enableMessageCounter: true })).toBe('#0');
    });

    it('should apply custom level strings', () => {
      const levelStrings = {
        long: ['TRC', 'DBG', 'INF', 'WRN', 'ERR', 'CRT', 'OFF'],
        short: ['t', 'd', 'i', 'w', 'e', 'c', 'o'],
      };

      expect(compileAndRender('%l/%L', { levelStrings })).toBe('INF/i');
    });

    it('should pass full line options to %+', () => {
      expect(
        compileAndRender('%+', { fullLine: { includeDateTime: false, includeLoggerName: false } }),
      ).toBe('[info] hello');
    });
  });
});
