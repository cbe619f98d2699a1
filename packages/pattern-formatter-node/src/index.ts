export { createMemoryBuffer } from './buffer/memoryBuffer.js';
export type { MemoryBuffer } from './buffer/types.js';
export { createFixedCalendarSource, createSystemCalendarSource } from './calendar/calendarSource.js';
export { compilePattern, maxFieldWidth } from './compiler/patternCompiler.js';
export type { CompileOptions, FormatterChain } from './compiler/types.js';
export {
  type LoadPatternFormatterConfigOptions,
  type PatternFormatterEnv,
  loadPatternFormatterConfig,
  loadPatternFormatterEnv,
  patternFormatterEnvSchema,
} from './config/formatterConfig.js';
export type { FullLineOptions } from './directives/fullLineDirective.js';
export type { Directive, DirectiveKind, LiteralDirective } from './directives/types.js';
export { createPatternFormatter, defaultPattern } from './formatter/patternFormatter.js';
export type { PatternFormatter, PatternFormatterOptions } from './formatter/types.js';
export {
  type LevelStrings,
  LogLevel,
  defaultLevelStrings,
  levelToShortString,
  levelToString,
} from './level.js';
export {
  type PatternFormatterMetrics,
  createPatternFormatterMetrics,
  patternFormatterMetricConfigs,
} from './metrics/formatterMetrics.js';
export {
  appendInt,
  appendZeroPadded,
  type FractionUnit,
  pad2,
  pad3,
  pad6,
  pad9,
  timeFraction,
} from './numericText/numericText.js';
export {
  createTimezoneOffsetCache,
  defaultOffsetRefreshWindowMs,
  getSharedTimezoneOffsetCache,
  offsetCacheLayout,
} from './offsetCache/timezoneOffsetCache.js';
export type { TimezoneOffsetCache, TimezoneOffsetCacheOptions } from './offsetCache/types.js';
export { nanosecondsFromMillis, nowNanoseconds } from './record/clock.js';
export { createLogRecord, createMessageCounter } from './record/logRecord.js';
export type { LogRecordInput, MessageCounter } from './record/types.js';
export type {
  CalendarBreakdown,
  CalendarSource,
  LineEnding,
  LogRecord,
  PatternTimeType,
} from './types.js';
