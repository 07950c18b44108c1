import type { PrometheusConfig, PrometheusMode } from './services/prometheus.js';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  maxRunsPerRequest: number;
  maxPopulation: number;
  maxDeliveriesPerRun: number;
  prometheus: PrometheusConfig;
}

export interface SweepScriptConfig {
  outputPath: string;
  traceDir?: string;
  seed: number;
  repetitions: number;
  populations: number[];
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  return value;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  return value;
}

function parsePrometheusMode(value: string | undefined): PrometheusMode {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'pushgateway') return 'pushgateway';
  if (normalized === 'scrape') return 'scrape';
  if (normalized === 'both') return 'both';
  throw new Error('Invalid PROMETHEUS_MODE. Expected pushgateway, scrape, or both');
}

function resolvePrometheusConfig(env: Env): PrometheusConfig {
  const pushgatewayUrl = env.PUSHGATEWAY_URL?.trim();
  return {
    enabled: env.PROMETHEUS_ENABLED?.trim().toLowerCase() === 'true',
    mode: parsePrometheusMode(env.PROMETHEUS_MODE),
    jobName: env.PROMETHEUS_JOB_NAME?.trim() || 'occ_backoff_sim',
    ...(pushgatewayUrl ? { pushgatewayUrl } : {})
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readPositiveInt(env, 'PORT', 3001),
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5173',
    maxRunsPerRequest: readPositiveInt(env, 'MAX_RUNS_PER_REQUEST', 20_000),
    maxPopulation: readPositiveInt(env, 'MAX_POPULATION', 10_000),
    maxDeliveriesPerRun: readPositiveInt(env, 'MAX_DELIVERIES_PER_RUN', 1_000_000),
    prometheus: resolvePrometheusConfig(env)
  };
}

export function parsePopulations(value: string | undefined, fallback: number[]): number[] {
  const raw = value?.trim();
  if (!raw) return fallback;
  const populations = raw.split(',').map((part) => Number(part.trim()));
  if (populations.length === 0 || !populations.every((n) => Number.isInteger(n) && n > 0)) {
    throw new Error(`Invalid SWEEP_POPULATIONS: "${raw}"`);
  }
  return populations;
}

export function loadSweepScriptConfig(env: Env = process.env): SweepScriptConfig {
  const traceDir = env.TRACE_DIR?.trim();
  return {
    outputPath: env.SWEEP_OUTPUT?.trim() || 'backoff_results.csv',
    seed: readInt(env, 'SWEEP_SEED', 1),
    repetitions: readPositiveInt(env, 'SWEEP_REPETITIONS', 100),
    populations: parsePopulations(env.SWEEP_POPULATIONS, [10, 20, 30, 40]),
    ...(traceDir ? { traceDir } : {})
  };
}
