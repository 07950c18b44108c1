import { createBackoff } from '../engine/Backoff.js';
import { DelayModel } from '../engine/DelayModel.js';
import type { RandomSource } from '../engine/Random.js';
import { RunStats } from '../engine/RunStats.js';
import { SimulationEngine } from '../engine/SimulationEngine.js';
import type { TraceSink } from '../engine/TraceSink.js';
import { OccClient } from '../nodes/OccClient.js';
import { OccServer } from '../nodes/OccServer.js';
import type { RunResult, ScenarioConfig } from '../types/simulation.js';

export interface Scenario {
  engine: SimulationEngine;
  server: OccServer;
  clients: OccClient[];
  stats: RunStats;
}

// Builds one isolated run: every object here belongs to this run alone.
export function buildScenario(config: ScenarioConfig, rng: RandomSource, trace?: TraceSink): Scenario {
  const stats = new RunStats();
  const net = new DelayModel({ mean: config.delayMean, stddev: config.delayStddev }, rng);
  const server = new OccServer(net, stats, trace);
  const clients: OccClient[] = [];
  for (let id = 0; id < config.populationSize; id += 1) {
    const backoff = createBackoff(config.variant, { base: config.backoffBase, cap: config.backoffCap }, rng);
    clients.push(new OccClient(id, net, backoff, stats, { maxAttempts: config.maxAttempts }));
  }
  const engine = new SimulationEngine(server, clients, { maxDeliveries: config.maxDeliveries });
  engine.startAll(0);
  return { engine, server, clients, stats };
}

export function runScenario(config: ScenarioConfig, rng: RandomSource, trace?: TraceSink): RunResult {
  const { engine, server, stats } = buildScenario(config, rng, trace);
  const elapsedTime = engine.run();
  return {
    elapsedTime,
    totalWriteCalls: stats.calls,
    totalWriteFailures: stats.failures,
    abandonedClients: stats.abandoned,
    finalVersion: server.getVersion(),
  };
}
