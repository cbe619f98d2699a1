import { describe, expect, it } from 'vitest';
import { loadPatternFormatterConfig, loadPatternFormatterEnv } from './formatterConfig.js';

describe('loadPatternFormatterEnv', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadPatternFormatterEnv({ source: {} })).toEqual({
      LOG_PATTERN: '%+',
      LOG_PATTERN_TIME: 'local',
      LOG_MESSAGE_COUNTER: false,
      LOG_FULL_LINE_DATETIME: true,
      LOG_FULL_LINE_NAME: true,
      LOG_TZ_OFFSET_REFRESH_MS: 5000,
    });
  });

  it('should coerce booleans and integers from strings', () => {
    const env = loadPatternFormatterEnv({
      source: {
        LOG_MESSAGE_COUNTER: 'yes',
        LOG_FULL_LINE_NAME: 'off',
        LOG_TZ_OFFSET_REFRESH_MS: '250',
      },
    });

    expect(env.LOG_MESSAGE_COUNTER).toBe(true);
    expect(env.LOG_FULL_LINE_NAME).toBe(false);
    expect(env.LOG_TZ_OFFSET_REFRESH_MS).toBe(250);
  });

  it('should treat empty strings as unset', () => {
    const env = loadPatternFormatterEnv({ source: { LOG_PATTERN: '' } });

    expect(env.LOG_PATTERN).toBe('%+');
  });

  it('should reject an unknown time type', () => {
    expect(() => loadPatternFormatterEnv({ source: { LOG_PATTERN_TIME: 'mars' } })).toThrow(
      /^Configuration validation failed:\n {2}- LOG_PATTERN_TIME: /,
    );
  });

  it('should reject a negative refresh window', () => {
    expect(() => loadPatternFormatterEnv({ source: { LOG_TZ_OFFSET_REFRESH_MS: '-1' } })).toThrow(
      /LOG_TZ_OFFSET_REFRESH_MS/,
    );
  });
});

describe('loadPatternFormatterConfig', () => {
  it('should map variables onto formatter options', () => {
    const options = loadPatternFormatterConfig({
      source: {
        LOG_PATTERN: '%l %v',
        LOG_PATTERN_TIME: 'utc',
        LOG_EOL: 'crlf',
        LOG_MESSAGE_COUNTER: 'true',
        LOG_FULL_LINE_DATETIME: 'false',
      },
    });

    expect(options).toEqual({
      pattern: '%l %v',
      timeType: 'utc',
      eol: 'crlf',
      enableMessageCounter: true,
      fullLine: { includeDateTime: false, includeLoggerName: true },
      offsetCache: undefined,
    });
  });

  it('should create a dedicated offset cache for a custom refresh window', () => {
    const options = loadPatternFormatterConfig({ source: { LOG_TZ_OFFSET_REFRESH_MS: '1000' } });

    expect(options.offsetCache?.refreshWindow).toBe(1_000_000_000n);
  });
});
