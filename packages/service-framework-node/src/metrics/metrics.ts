import { Counter, Histogram, Registry } from 'prom-client';
import type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
  MetricsFromConfigs,
} from './types.js';

const defaultHistogramBuckets = [64, 128, 256, 512, 1024, 4096, 16384];

const normalizeServiceName = (serviceName: string): string => {
  return serviceName
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
};

function validateMetricName(name: string): void {
  if (!name) {
    throw new Error('Metric name cannot be empty');
  }

  const validNamePattern = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
  if (!validNamePattern.test(name)) {
    throw new Error(
      `Invalid metric name '${name}'. Metric names must match pattern: [a-zA-Z_:][a-zA-Z0-9_:]*`,
    );
  }
}

function validateLabelNames(labelNames: readonly string[] | undefined): void {
  if (!labelNames) {
    return;
  }

  const validLabelPattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

  for (const label of labelNames) {
    if (!validLabelPattern.test(label)) {
      throw new Error(
        `Invalid label name '${label}'. Label names must match pattern: [a-zA-Z_][a-zA-Z0-9_]*`,
      );
    }

    if (label.startsWith('__')) {
      throw new Error(`Label name '${label}' is reserved. Label names cannot start with '__'`);
    }
  }
}

/**
 * Creates an isolated prom-client registry and instantiates every metric in
 * `config.metrics` under `<process_name>_<prefix>`.
 */
export function createMetricsContext<TMetricsConfigs extends Record<string, MetricConfig>>(
  config: MetricsConfig<TMetricsConfigs>,
): MetricsContext<MetricsFromConfigs<TMetricsConfigs>> {
  const registry = new Registry();

  const normalizedServiceName = normalizeServiceName(config.envContext.config.PROCESS_NAME);
  const fullPrefix = config.prefix
    ? `${normalizedServiceName}_${config.prefix}`
    : `${normalizedServiceName}_`;

  function createCounter<T extends string>(metricConfig: MetricConfigCounter<T>): Counter<T> {
    validateMetricName(metricConfig.name);
    validateLabelNames(metricConfig.labelNames);

    return new Counter<T>({
      name: `${fullPrefix}${metricConfig.name}`,
      help: metricConfig.help,
      labelNames: metricConfig.labelNames ?? [],
      registers: [registry],
    });
  }

  function createHistogram<T extends string>(
    metricConfig: MetricConfigHistogram<T>,
  ): Histogram<T> {
    validateMetricName(metricConfig.name);
    validateLabelNames(metricConfig.labelNames);

    return new Histogram<T>({
      name: `${fullPrefix}${metricConfig.name}`,
      help: metricConfig.help,
      labelNames: metricConfig.labelNames ?? [],
      buckets: metricConfig.buckets ?? defaultHistogramBuckets,
      registers: [registry],
    });
  }

  function createMetricFromConfig(metricConfig: MetricConfig): Counter<string> | Histogram<string> {
    switch (metricConfig.type) {
      case 'counter':
        return createCounter(metricConfig);
      case 'histogram':
        return createHistogram(metricConfig);
    }
  }

  const instantiatedMetrics: Record<string, Counter<string> | Histogram<string>> = {};
  for (const [key, metricConfig] of Object.entries(config.metrics)) {
    instantiatedMetrics[key] = createMetricFromConfig(metricConfig);
  }

  return {
    getRegistry(): Registry {
      return registry;
    },

    createCounter,
    createHistogram,

    async getMetricsAsString(): Promise<string> {
      return await registry.metrics();
    },

    clearMetrics(): void {
      registry.clear();
    },

    metrics: instantiatedMetrics as unknown as MetricsFromConfigs<TMetricsConfigs>,
  };
}
