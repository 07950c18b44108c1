import { describe, expect, it } from 'vitest';
import { EventQueue } from '../EventQueue.js';
import { createRandom } from '../Random.js';

function start(clientId: number) {
  return { type: 'client_start' as const, clientId };
}

describe('EventQueue', () => {
  it('pops in delivery time order', () => {
    const queue = new EventQueue();
    queue.push({ deliverAt: 30, message: start(0) });
    queue.push({ deliverAt: 10, message: start(1) });
    queue.push({ deliverAt: 20, message: start(2) });
    expect(queue.pop()?.message.clientId).toBe(1);
    expect(queue.pop()?.message.clientId).toBe(2);
    expect(queue.pop()?.message.clientId).toBe(0);
    expect(queue.pop()).toBeUndefined();
  });

  it('keeps insertion order among equal times', () => {
    const queue = new EventQueue();
    for (let id = 0; id < 6; id += 1) {
      queue.push({ deliverAt: 5, message: start(id) });
    }
    const ids: number[] = [];
    for (let next = queue.pop(); next; next = queue.pop()) {
      ids.push(next.message.clientId);
    }
    expect(ids).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('sorts a large random batch', () => {
    const queue = new EventQueue();
    const rng = createRandom(4);
    for (let i = 0; i < 1_000; i += 1) {
      queue.push({ deliverAt: Math.floor(rng.next() * 100), message: start(i) });
    }
    expect(queue.size).toBe(1_000);
    let previous = queue.pop();
    for (let next = queue.pop(); next; next = queue.pop()) {
      if (!previous) throw new Error('queue drained early');
      expect(next.deliverAt > previous.deliverAt || (next.deliverAt === previous.deliverAt && next.seq > previous.seq)).toBe(true);
      previous = next;
    }
    expect(queue.size).toBe(0);
  });
});
