import { describe, expect, it } from 'vitest';
import { createBackoff } from '../Backoff.js';
import { DelayModel } from '../DelayModel.js';
import { SimulationInvariantError, SimulationLimitError } from '../errors.js';
import type { ScheduledDelivery } from '../InternalTypes.js';
import { createRandom, type RandomSource } from '../Random.js';
import { RunStats } from '../RunStats.js';
import { SimulationEngine } from '../SimulationEngine.js';
import { MemoryTraceSink } from '../TraceSink.js';
import { OccClient } from '../../nodes/OccClient.js';
import { OccServer } from '../../nodes/OccServer.js';
import type { BackoffVariant } from '../../types/simulation.js';

// With next() pinned at 0 every delay is exactly the mean and jitter collapses to its lower bound.
const pinned: RandomSource = { next: () => 0 };

function setup(population: number, variant: BackoffVariant, rng: RandomSource, maxDeliveries?: number) {
  const stats = new RunStats();
  const trace = new MemoryTraceSink();
  const net = new DelayModel({ mean: 10, stddev: 2 }, rng);
  const server = new OccServer(net, stats, trace);
  const clients = Array.from(
    { length: population },
    (_, id) => new OccClient(id, net, createBackoff(variant, { base: 5, cap: 2000 }, rng), stats),
  );
  const engine = new SimulationEngine(server, clients, { maxDeliveries });
  return { stats, trace, server, clients, engine };
}

describe('SimulationEngine', () => {
  it('completes a lone client in one read/write round trip', () => {
    const { engine, stats, server, clients } = setup(1, 'None', pinned);
    engine.startAll(0);
    expect(engine.run()).toBe(40);
    expect(engine.getProcessedCount()).toBe(5);
    expect(stats.calls).toBe(1);
    expect(stats.failures).toBe(0);
    expect(server.getVersion()).toBe(1);
    expect(clients[0]?.getStatus()).toBe('done');
  });

  it('retries the loser of a tie immediately without backoff', () => {
    const { engine, stats, server, trace, clients } = setup(2, 'None', pinned);
    engine.startAll(0);
    expect(engine.run()).toBe(80);
    expect(stats.calls).toBe(3);
    expect(stats.failures).toBe(1);
    expect(server.getVersion()).toBe(2);
    expect(trace.getTimes()).toEqual([30, 70]);
    expect(clients[1]?.getAttempt()).toBe(1);
  });

  it('adds the backoff wait on top of the network delay', () => {
    const { engine, trace } = setup(2, 'Exponential', pinned);
    engine.startAll(0);
    // loser hears back at 40, re-reads at 40 + 10 + expo(1) = 60
    expect(engine.run()).toBe(90);
    expect(trace.getTimes()).toEqual([30, 80]);
  });

  it('processes deliveries in non-decreasing time order', () => {
    const { engine } = setup(20, 'FullJitter', createRandom(8));
    const times: number[] = [];
    engine.onDelivery((delivery: ScheduledDelivery) => times.push(delivery.deliverAt));
    engine.startAll(0);
    const elapsed = engine.run();
    expect(times.length).toBe(engine.getProcessedCount());
    for (let i = 1; i < times.length; i += 1) {
      expect(times[i]).toBeGreaterThanOrEqual(times[i - 1] ?? 0);
    }
    expect(times[times.length - 1]).toBe(elapsed);
  });

  it('rejects negative and non-finite delivery times', () => {
    const { engine } = setup(1, 'None', pinned);
    expect(() => engine.schedule({ deliverAt: -1, message: { type: 'client_start', clientId: 0 } })).toThrow(
      SimulationInvariantError,
    );
    expect(() => engine.schedule({ deliverAt: Number.NaN, message: { type: 'client_start', clientId: 0 } })).toThrow(
      SimulationInvariantError,
    );
  });

  it('rejects deliveries addressed to an unknown client', () => {
    const { engine } = setup(1, 'None', pinned);
    expect(() =>
      engine.schedule({ deliverAt: 0, message: { type: 'read_request', clientId: 7, replyTo: 'read_response' } }),
    ).toThrow(SimulationInvariantError);
  });

  it('aborts when a delivery is due before the clock', () => {
    const { engine } = setup(1, 'None', pinned);
    engine.startAll(0);
    engine.run();
    engine.schedule({ deliverAt: 5, message: { type: 'client_start', clientId: 0 } });
    expect(() => engine.run()).toThrow(/Clock moved backwards/);
  });

  it('rejects duplicate client ids', () => {
    const stats = new RunStats();
    const net = new DelayModel({ mean: 10, stddev: 2 }, pinned);
    const server = new OccServer(net, stats);
    const backoff = createBackoff('None', { base: 5, cap: 2000 }, pinned);
    const clients = [new OccClient(1, net, backoff, stats), new OccClient(1, net, backoff, stats)];
    expect(() => new SimulationEngine(server, clients)).toThrow(SimulationInvariantError);
  });

  it('stops runaway runs when a delivery limit is set', () => {
    const { engine } = setup(2, 'None', pinned, 3);
    engine.startAll(0);
    expect(() => engine.run()).toThrow(SimulationLimitError);
    expect(engine.getProcessedCount()).toBe(3);
  });
});
