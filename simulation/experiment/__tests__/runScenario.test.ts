import { describe, expect, it } from 'vitest';
import { createRandom } from '../../engine/Random.js';
import { MemoryTraceSink } from '../../engine/TraceSink.js';
import { BACKOFF_VARIANTS, type ScenarioConfig } from '../../types/simulation.js';
import { buildScenario, runScenario } from '../runScenario.js';

const base: ScenarioConfig = {
  populationSize: 10,
  variant: 'None',
  backoffBase: 5,
  backoffCap: 2000,
  delayMean: 10,
  delayStddev: 2,
};

describe('runScenario', () => {
  it('runs ten contending clients to completion without backoff', () => {
    const result = runScenario(base, createRandom(2024));
    expect(result.totalWriteCalls).toBeGreaterThanOrEqual(10);
    expect(result.finalVersion).toBe(10);
    expect(result.totalWriteFailures).toBe(result.totalWriteCalls - 10);
    expect(result.elapsedTime).toBeGreaterThan(0);
    expect(result.abandonedClients).toBe(0);
  });

  it('finishes a lone client in a single round trip under every policy', () => {
    for (const variant of BACKOFF_VARIANTS) {
      const { engine, clients, stats } = buildScenario({ ...base, populationSize: 1, variant }, createRandom(5));
      expect(engine.run()).toBeGreaterThan(0);
      expect(stats.calls).toBe(1);
      expect(stats.failures).toBe(0);
      expect(engine.getProcessedCount()).toBe(5);
      expect(clients[0]?.getStatus()).toBe('done');
    }
  });

  it('commits exactly one write per client', () => {
    for (const variant of BACKOFF_VARIANTS) {
      for (const populationSize of [2, 7, 15]) {
        const trace = new MemoryTraceSink();
        const result = runScenario({ ...base, populationSize, variant }, createRandom(populationSize), trace);
        expect(result.totalWriteCalls - result.totalWriteFailures).toBe(result.finalVersion);
        expect(result.finalVersion).toBe(populationSize);
        expect(trace.getTimes()).toHaveLength(populationSize);
        const times = trace.getTimes();
        for (let i = 1; i < times.length; i += 1) {
          expect(times[i]).toBeGreaterThanOrEqual(times[i - 1] ?? 0);
        }
      }
    }
  });

  it('lets exactly one of the writes against version 0 succeed', () => {
    const { engine, server } = buildScenario({ ...base, populationSize: 12 }, createRandom(31));
    let winnersAtZero = 0;
    let writesAtZero = 0;
    engine.onDelivery(({ message }) => {
      if (message.type === 'write_request' && message.expectedVersion === 0) {
        writesAtZero += 1;
        if (server.getVersion() === 0) winnersAtZero += 1;
      }
    });
    engine.run();
    expect(writesAtZero).toBeGreaterThanOrEqual(1);
    expect(winnersAtZero).toBe(1);
  });

  it('abandons clients at the attempt ceiling', () => {
    const result = runScenario({ ...base, maxAttempts: 1 }, createRandom(9));
    expect(result.totalWriteCalls).toBe(10);
    expect(result.totalWriteFailures).toBe(result.abandonedClients);
    expect(result.finalVersion + result.abandonedClients).toBe(10);
    expect(result.finalVersion).toBeGreaterThanOrEqual(1);
  });

  it('is reproducible for a given seed', () => {
    const a = runScenario({ ...base, variant: 'Decorrelated' }, createRandom(77));
    const b = runScenario({ ...base, variant: 'Decorrelated' }, createRandom(77));
    expect(a).toEqual(b);
  });
});
