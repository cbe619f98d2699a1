import type { Logger } from '@glyphlog/service-framework-node';
import {
  createAmPmDirective,
  createClock12Directive,
  createClock24Directive,
  createClock24ShortDirective,
  createDateTimeDirective,
  createDayDirective,
  createHour12Directive,
  createHour24Directive,
  createMicrosecondsDirective,
  createMillisecondsDirective,
  createMinuteDirective,
  createMonthAbbrevDirective,
  createMonthDirective,
  createMonthFullDirective,
  createNanosecondsDirective,
  createSecondDirective,
  createShortDateDirective,
  createShortYearDirective,
  createWeekdayAbbrevDirective,
  createWeekdayFullDirective,
  createYearDirective,
} from '../directives/dateTimeDirectives.js';
import { type FullLineOptions, createFullLineDirective } from '../directives/fullLineDirective.js';
import { createUtcOffsetDirective } from '../directives/offsetDirective.js';
import {
  createCharDirective,
  createLevelDirective,
  createLiteralDirective,
  createLoggerNameDirective,
  createMessageDirective,
  createMessageIdDirective,
  createProcessIdDirective,
  createShortLevelDirective,
  createThreadIdDirective,
} from '../directives/textDirectives.js';
import type { Directive } from '../directives/types.js';
import { type LevelStrings, defaultLevelStrings } from '../level.js';
import { getSharedTimezoneOffsetCache } from '../offsetCache/timezoneOffsetCache.js';
import type { TimezoneOffsetCache } from '../offsetCache/types.js';
import type { CompileOptions, FormatterChain } from './types.js';

/** Widths above this are clamped. */
export const maxFieldWidth = 4096;

interface SelectorContext {
  levelStrings: LevelStrings;
  enableMessageCounter: boolean;
  fullLine: FullLineOptions;
  processId: number;
  offsetCache: TimezoneOffsetCache;
  logger?: Logger;
  onOffsetRefresh?: () => void;
}

type DirectiveFactory = (width: number, context: SelectorContext) => Directive | undefined;

const selectorTable = new Map<string, DirectiveFactory>([
  ['n', (width) => createLoggerNameDirective(width)],
  ['l', (width, context) => createLevelDirective(width, context.levelStrings)],
  ['L', (width, context) => createShortLevelDirective(width, context.levelStrings)],
  ['t', (width) => createThreadIdDirective(width)],
  ['P', (width, context) => createProcessIdDirective(width, context.processId)],
  ['v', () => createMessageDirective()],
  ['a', (width) => createWeekdayAbbrevDirective(width)],
  ['A', (width) => createWeekdayFullDirective(width)],
  ['b', (width) => createMonthAbbrevDirective(width)],
  ['h', (width) => createMonthAbbrevDirective(width)],
  ['B', (width) => createMonthFullDirective(width)],
  ['c', () => createDateTimeDirective()],
  ['C', () => createShortYearDirective()],
  ['Y', () => createYearDirective()],
  ['D', () => createShortDateDirective()],
  ['x', () => createShortDateDirective()],
  ['m', () => createMonthDirective()],
  ['d', () => createDayDirective()],
  ['H', () => createHour24Directive()],
  ['I', () => createHour12Directive()],
  ['M', () => createMinuteDirective()],
  ['S', () => createSecondDirective()],
  ['e', () => createMillisecondsDirective()],
  ['f', () => createMicrosecondsDirective()],
  ['F', () => createNanosecondsDirective()],
  ['p', () => createAmPmDirective()],
  ['r', () => createClock12Directive()],
  ['R', () => createClock24ShortDirective()],
  ['T', () => createClock24Directive()],
  ['X', () => createClock24Directive()],
  [
    'z',
    (_width, context) =>
      createUtcOffsetDirective({
        cache: context.offsetCache,
        logger: context.logger,
        onRefresh: context.onOffsetRefresh,
      }),
  ],
  ['+', (_width, context) => createFullLineDirective(context.fullLine, context.levelStrings)],
  [
    'i',
    (_width, context) => (context.enableMessageCounter ? createMessageIdDirective() : undefined),
  ],
]);

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function createLiteralRun(text: string): Directive {
  return text.length === 1 && text.charCodeAt(0) < 0x80
    ? createCharDirective(text)
    : createLiteralDirective(text);
}

/**
 * Compiles a pattern into its directive chain. Every string is a valid
 * pattern: unknown selectors are echoed as written and a `%` at the very end
 * is dropped together with any width digits after it.
 */
export function compilePattern(pattern: string, options: CompileOptions = {}): FormatterChain {
  const logger = options.logger?.createChild('compiler');
  const metrics = options.metrics;

  const context: SelectorContext = {
    levelStrings: options.levelStrings ?? defaultLevelStrings,
    enableMessageCounter: options.enableMessageCounter ?? false,
    fullLine: options.fullLine ?? {},
    processId: options.processId ?? process.pid,
    offsetCache: options.offsetCache ?? getSharedTimezoneOffsetCache(options.timeType),
    logger,
    onOffsetRefresh: metrics ? () => metrics.offsetRefreshes.inc() : undefined,
  };

  const chars = Array.from(pattern);
  const directives: Directive[] = [];
  let pendingLiteral = '';

  const flushLiteral = () => {
    if (pendingLiteral.length > 0) {
      directives.push(createLiteralRun(pendingLiteral));
      pendingLiteral = '';
    }
  };

  let index = 0;
  while (index < chars.length) {
    const char = chars[index++];

    if (char !== '%') {
      pendingLiteral += char;
      continue;
    }

    flushLiteral();

    let widthDigits = '';
    while (index < chars.length && isDigit(chars[index])) {
      widthDigits += chars[index++];
    }

    if (index >= chars.length) {
      break;
    }

    const selector = chars[index++];
    const width =
      widthDigits.length > 0 ? Math.min(Number.parseInt(widthDigits, 10), maxFieldWidth) : 0;

    const directive = selectorTable.get(selector)?.(width, context);
    if (directive) {
      directives.push(directive);
      continue;
    }

    const source = `%${widthDigits}${selector}`;
    directives.push(createLiteralDirective(source));
    logger?.debug('Unknown pattern directive rendered as literal text', { directive: source });
    metrics?.unknownDirectives.inc();
  }

  flushLiteral();

  return Object.freeze(directives);
}
