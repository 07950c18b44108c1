import type { BackoffPolicy } from '../engine/Backoff.js';
import type { DelayModel } from '../engine/DelayModel.js';
import type { Delivery, ReadResponse, WriteResponse } from '../engine/InternalTypes.js';
import type { RunStats } from '../engine/RunStats.js';

export type ClientStatus = 'start' | 'awaiting_read' | 'awaiting_write' | 'done' | 'abandoned';

export interface OccClientOptions {
  maxAttempts?: number;
}

// OCC client: updates the row exactly once via read, then conditional write.
// A rejected write bumps the attempt counter and re-reads after network delay plus the policy's backoff.
// Retries are unbounded unless maxAttempts is set.
export class OccClient {
  private attempt = 0;

  private status: ClientStatus = 'start';

  constructor(
    readonly id: number,
    private readonly net: DelayModel,
    private readonly backoff: BackoffPolicy,
    private readonly stats: RunStats,
    private readonly options: OccClientOptions = {},
  ) {}

  getAttempt(): number {
    return this.attempt;
  }

  getStatus(): ClientStatus {
    return this.status;
  }

  start(now: number): Delivery {
    this.status = 'awaiting_read';
    return this.readRequest(now + this.net.delay());
  }

  onReadResponse(now: number, response: ReadResponse): Delivery {
    this.status = 'awaiting_write';
    return {
      deliverAt: now + this.net.delay(),
      message: {
        type: 'write_request',
        clientId: this.id,
        expectedVersion: response.version,
        replyTo: 'write_response',
      },
    };
  }

  onWriteResponse(now: number, response: WriteResponse): Delivery | undefined {
    if (response.success) {
      this.status = 'done';
      return undefined;
    }

    this.attempt += 1;
    const { maxAttempts } = this.options;
    if (maxAttempts !== undefined && this.attempt >= maxAttempts) {
      this.status = 'abandoned';
      this.stats.abandoned += 1;
      return undefined;
    }

    this.status = 'awaiting_read';
    return this.readRequest(now + this.net.delay() + this.backoff.backoff(this.attempt));
  }

  private readRequest(deliverAt: number): Delivery {
    return {
      deliverAt,
      message: { type: 'read_request', clientId: this.id, replyTo: 'read_response' },
    };
  }
}
