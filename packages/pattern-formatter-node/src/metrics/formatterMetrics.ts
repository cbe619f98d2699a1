import {
  type DefaultEnvContext,
  type MetricConfig,
  type MetricsContext,
  type MetricsFromConfigs,
  createMetricsContext,
} from '@glyphlog/service-framework-node';

export const patternFormatterMetricConfigs = {
  formattedLines: {
    type: 'counter',
    name: 'formatted_lines_total',
    help: 'Log records rendered through a compiled pattern',
  },
  formattedLineBytes: {
    type: 'histogram',
    name: 'formatted_line_bytes',
    help: 'Bytes appended per rendered record, line ending included',
  },
  unknownDirectives: {
    type: 'counter',
    name: 'unknown_directives_total',
    help: 'Pattern directives with an unknown selector, rendered as literal text',
  },
  offsetRefreshes: {
    type: 'counter',
    name: 'tz_offset_refreshes_total',
    help: 'UTC offset recomputations performed for %z',
  },
} as const satisfies Record<string, MetricConfig>;

export type PatternFormatterMetrics = MetricsFromConfigs<typeof patternFormatterMetricConfigs>;

export function createPatternFormatterMetrics(
  envContext: DefaultEnvContext,
): MetricsContext<PatternFormatterMetrics> {
  return createMetricsContext({
    envContext,
    prefix: 'pattern_formatter_',
    metrics: patternFormatterMetricConfigs,
  });
}
