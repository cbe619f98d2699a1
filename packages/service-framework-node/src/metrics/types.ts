import type { Counter, Histogram, Registry } from 'prom-client';
import type { DefaultEnvContext } from '../environment/types.js';

export interface MetricConfigCounter<T extends string = string> {
  type: 'counter';
  name: string;
  help: string;
  labelNames?: readonly T[];
}

export interface MetricConfigHistogram<T extends string = string> {
  type: 'histogram';
  name: string;
  help: string;
  labelNames?: readonly T[];
  buckets?: number[];
}

export type MetricConfig<T extends string = string> =
  | MetricConfigCounter<T>
  | MetricConfigHistogram<T>;

export type MetricFromConfig<T> =
  T extends MetricConfigCounter<infer L>
    ? Counter<L>
    : T extends MetricConfigHistogram<infer L>
      ? Histogram<L>
      : never;

export type MetricsFromConfigs<T extends Record<string, MetricConfig>> = {
  [K in keyof T]: MetricFromConfig<T[K]>;
};

export interface MetricsConfig<
  TMetricsConfigs extends Record<string, MetricConfig> = Record<string, MetricConfig>,
> {
  envContext: DefaultEnvContext;
  prefix?: string;
  metrics: TMetricsConfigs;
}

export interface MetricsContext<TMetrics> {
  getRegistry: () => Registry;
  createCounter: <T extends string>(config: MetricConfigCounter<T>) => Counter<T>;
  createHistogram: <T extends string>(config: MetricConfigHistogram<T>) => Histogram<T>;
  getMetricsAsString: () => Promise<string>;
  clearMetrics: () => void;
  metrics: TMetrics;
}
