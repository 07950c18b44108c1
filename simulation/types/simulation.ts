export type BackoffVariant = 'None' | 'Exponential' | 'EqualJitter' | 'FullJitter' | 'Decorrelated';

// Order matches the batch sweep report: variants are the inner loop of each population.
export const BACKOFF_VARIANTS: readonly BackoffVariant[] = [
  'Exponential',
  'Decorrelated',
  'EqualJitter',
  'FullJitter',
  'None',
];

export interface BackoffConfig {
  base: number;
  cap: number;
}

export interface DelayConfig {
  mean: number;
  stddev: number;
}

export interface ScenarioConfig {
  populationSize: number;
  variant: BackoffVariant;
  backoffBase: number;
  backoffCap: number;
  delayMean: number;
  delayStddev: number;
  /** Failed attempts after which a client gives up. Unbounded when absent. */
  maxAttempts?: number;
  /** Aborts the run once this many deliveries have been processed. */
  maxDeliveries?: number;
}

export interface RunResult {
  elapsedTime: number;
  totalWriteCalls: number;
  totalWriteFailures: number;
  abandonedClients: number;
  finalVersion: number;
}

export interface AggregateResult {
  populationSize: number;
  variant: BackoffVariant;
  repetitions: number;
  avgElapsedTime: number;
  avgWriteCalls: number;
  avgWriteFailures: number;
}

export interface ExperimentConfig {
  populations: number[];
  variants: BackoffVariant[];
  repetitions: number;
  backoffBase: number;
  backoffCap: number;
  delayMean: number;
  delayStddev: number;
  seed: number;
  maxAttempts?: number;
  maxDeliveries?: number;
}

export interface SweepReport {
  config: ExperimentConfig;
  rows: AggregateResult[];
}

export const DEFAULT_EXPERIMENT: ExperimentConfig = {
  populations: [10, 20, 30, 40],
  variants: [...BACKOFF_VARIANTS],
  repetitions: 100,
  backoffBase: 5,
  backoffCap: 2000,
  delayMean: 10,
  delayStddev: 2,
  seed: 1,
};
