import { type EnvSource, createEnvParser } from '@glyphlog/service-framework-node';
import { TB } from '@glyphlog/service-framework-node/typebox';
import { defaultPattern } from '../formatter/patternFormatter.js';
import type { PatternFormatterOptions } from '../formatter/types.js';
import {
  createTimezoneOffsetCache,
  defaultOffsetRefreshWindowMs,
} from '../offsetCache/timezoneOffsetCache.js';

export const patternFormatterEnvSchema = TB.Object({
  LOG_PATTERN: TB.String({ default: defaultPattern }),
  LOG_PATTERN_TIME: TB.Union([TB.Literal('local'), TB.Literal('utc')], { default: 'local' }),
  LOG_EOL: TB.Optional(TB.Union([TB.Literal('lf'), TB.Literal('crlf')])),
  LOG_MESSAGE_COUNTER: TB.Boolean({ default: false }),
  LOG_FULL_LINE_DATETIME: TB.Boolean({ default: true }),
  LOG_FULL_LINE_NAME: TB.Boolean({ default: true }),
  LOG_TZ_OFFSET_REFRESH_MS: TB.Integer({ default: defaultOffsetRefreshWindowMs, minimum: 0 }),
});

export type PatternFormatterEnv = TB.Static<typeof patternFormatterEnvSchema>;

export interface LoadPatternFormatterConfigOptions {
  /** Defaults to `process.env`. */
  source?: EnvSource;
}

export function loadPatternFormatterEnv(
  options: LoadPatternFormatterConfigOptions = {},
): PatternFormatterEnv {
  return createEnvParser().parse(patternFormatterEnvSchema, { source: options.source });
}

/**
 * Reads the `LOG_*` variables into formatter options. Throws when a variable
 * is present but invalid. A non-default refresh window gets its own offset
 * cache; otherwise the process-wide one is used.
 */
export function loadPatternFormatterConfig(
  options: LoadPatternFormatterConfigOptions = {},
): PatternFormatterOptions {
  const env = loadPatternFormatterEnv(options);

  return {
    pattern: env.LOG_PATTERN,
    timeType: env.LOG_PATTERN_TIME,
    eol: env.LOG_EOL,
    enableMessageCounter: env.LOG_MESSAGE_COUNTER,
    fullLine: {
      includeDateTime: env.LOG_FULL_LINE_DATETIME,
      includeLoggerName: env.LOG_FULL_LINE_NAME,
    },
    offsetCache:
      env.LOG_TZ_OFFSET_REFRESH_MS === defaultOffsetRefreshWindowMs
        ? undefined
        : createTimezoneOffsetCache({ refreshWindowMs: env.LOG_TZ_OFFSET_REFRESH_MS }),
  };
}
