import { createRandom, deriveSeed } from '../engine/Random.js';
import type { TraceSink } from '../engine/TraceSink.js';
import type {
  AggregateResult,
  BackoffVariant,
  ExperimentConfig,
  ScenarioConfig,
  SweepReport,
} from '../types/simulation.js';
import { runScenario } from './runScenario.js';

export interface RepetitionOptions {
  repetitions: number;
  seed: number;
  trace?: TraceSink;
}

export interface SweepOptions {
  traceSinkFor?: (variant: BackoffVariant, populationSize: number) => TraceSink | undefined;
  onCell?: (row: AggregateResult) => void;
}

export function runRepetitions(config: ScenarioConfig, options: RepetitionOptions): AggregateResult {
  let elapsed = 0;
  let calls = 0;
  let failures = 0;
  for (let rep = 0; rep < options.repetitions; rep += 1) {
    const rng = createRandom(deriveSeed(options.seed, config.variant, config.populationSize, rep));
    const result = runScenario(config, rng, options.trace);
    elapsed += result.elapsedTime;
    calls += result.totalWriteCalls;
    failures += result.totalWriteFailures;
  }

  const n = Math.max(1, options.repetitions);
  return {
    populationSize: config.populationSize,
    variant: config.variant,
    repetitions: options.repetitions,
    avgElapsedTime: elapsed / n,
    avgWriteCalls: calls / n,
    avgWriteFailures: failures / n,
  };
}

export function totalRuns(config: ExperimentConfig): number {
  return config.populations.length * config.variants.length * config.repetitions;
}

// Populations form the outer loop and variants the inner one, matching the CSV row order.
export async function runSweep(config: ExperimentConfig, options: SweepOptions = {}): Promise<SweepReport> {
  const rows: AggregateResult[] = [];
  for (const populationSize of config.populations) {
    for (const variant of config.variants) {
      const trace = options.traceSinkFor?.(variant, populationSize);
      const row = runRepetitions(
        {
          populationSize,
          variant,
          backoffBase: config.backoffBase,
          backoffCap: config.backoffCap,
          delayMean: config.delayMean,
          delayStddev: config.delayStddev,
          maxAttempts: config.maxAttempts,
          maxDeliveries: config.maxDeliveries,
        },
        { repetitions: config.repetitions, seed: config.seed, trace },
      );
      if (trace?.flush) {
        await trace.flush();
      }
      rows.push(row);
      options.onCell?.(row);
    }
  }
  return { config, rows };
}
