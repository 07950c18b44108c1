import type { OccClient } from '../nodes/OccClient.js';
import type { OccServer } from '../nodes/OccServer.js';
import { EventQueue } from './EventQueue.js';
import type { Delivery, ScheduledDelivery } from './InternalTypes.js';
import { SimulationInvariantError, SimulationLimitError } from './errors.js';

export interface SimulationEngineOptions {
  maxDeliveries?: number;
}

export class SimulationEngine {
  private readonly queue = new EventQueue();

  private readonly clients = new Map<number, OccClient>();

  private readonly callbacks: Array<(delivery: ScheduledDelivery) => void> = [];

  private simTime = 0;

  private processed = 0;

  constructor(
    private readonly server: OccServer,
    clients: readonly OccClient[],
    private readonly options: SimulationEngineOptions = {},
  ) {
    for (const client of clients) {
      if (this.clients.has(client.id)) {
        throw new SimulationInvariantError(`Duplicate client id: ${client.id}`);
      }
      this.clients.set(client.id, client);
    }
  }

  onDelivery(cb: (delivery: ScheduledDelivery) => void): void {
    this.callbacks.push(cb);
  }

  getProcessedCount(): number {
    return this.processed;
  }

  startAll(at = 0): void {
    for (const client of this.clients.values()) {
      this.schedule({ deliverAt: at, message: { type: 'client_start', clientId: client.id } });
    }
  }

  schedule(delivery: Delivery): void {
    if (!Number.isFinite(delivery.deliverAt) || delivery.deliverAt < 0) {
      throw new SimulationInvariantError(`Invalid delivery time ${delivery.deliverAt} for ${delivery.message.type}`);
    }
    this.requireClient(delivery.message.clientId);
    this.queue.push(delivery);
  }

  // Drains the queue and returns the final clock value.
  run(): number {
    const { maxDeliveries } = this.options;
    for (;;) {
      const next = this.queue.pop();
      if (!next) {
        break;
      }
      if (next.deliverAt < this.simTime) {
        throw new SimulationInvariantError(
          `Clock moved backwards: ${next.message.type} due at ${next.deliverAt}, clock at ${this.simTime}`,
        );
      }
      if (maxDeliveries !== undefined && this.processed >= maxDeliveries) {
        throw new SimulationLimitError(this.processed);
      }

      this.simTime = next.deliverAt;
      this.processed += 1;
      for (const cb of this.callbacks) {
        cb(next);
      }

      const followUp = this.dispatch(next);
      if (followUp) {
        this.schedule(followUp);
      }
    }
    return this.simTime;
  }

  private dispatch(delivery: ScheduledDelivery): Delivery | undefined {
    const now = this.simTime;
    const { message } = delivery;
    switch (message.type) {
      case 'client_start':
        return this.requireClient(message.clientId).start(now);
      case 'read_request':
        return this.server.read(now, message);
      case 'write_request':
        return this.server.write(now, message);
      case 'read_response':
        return this.requireClient(message.clientId).onReadResponse(now, message);
      case 'write_response':
        return this.requireClient(message.clientId).onWriteResponse(now, message);
      default:
        throw new SimulationInvariantError(`Unsupported message: ${JSON.stringify(message)}`);
    }
  }

  private requireClient(clientId: number): OccClient {
    const client = this.clients.get(clientId);
    if (!client) {
      throw new SimulationInvariantError(`No client with id ${clientId}`);
    }
    return client;
  }
}
