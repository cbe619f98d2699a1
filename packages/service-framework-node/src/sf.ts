export * from './diagnostics/diagnostics.js';
export * from './diagnostics/types.js';
export { createEnvContext, createEnvParser } from './environment/environment.js';
export {
  DefaultEnvSchemaType,
  type DefaultEnv,
  type DefaultEnvContext,
  type DefaultEnvSchema,
  type EnvContext,
  type EnvParserConfig,
  type EnvSource,
} from './environment/types.js';
export { createMetricsContext } from './metrics/metrics.js';
export type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
  MetricsFromConfigs,
} from './metrics/types.js';
