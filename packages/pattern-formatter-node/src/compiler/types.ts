import type { Logger } from '@glyphlog/service-framework-node';
import type { FullLineOptions } from '../directives/fullLineDirective.js';
import type { Directive } from '../directives/types.js';
import type { LevelStrings } from '../level.js';
import type { PatternFormatterMetrics } from '../metrics/formatterMetrics.js';
import type { TimezoneOffsetCache } from '../offsetCache/types.js';
import type { PatternTimeType } from '../types.js';

export interface CompileOptions {
  levelStrings?: LevelStrings;
  /** Enables `%i`; without it the selector is unknown and echoed. */
  enableMessageCounter?: boolean;
  fullLine?: FullLineOptions;
  /** Defaults to `process.pid`. */
  processId?: number;
  /** Selects the process-wide offset cache when `offsetCache` is not given. Defaults to `local`. */
  timeType?: PatternTimeType;
  /** Defaults to the process-wide cache for `timeType`. */
  offsetCache?: TimezoneOffsetCache;
  logger?: Logger;
  metrics?: PatternFormatterMetrics;
}

export type FormatterChain = readonly Directive[];
