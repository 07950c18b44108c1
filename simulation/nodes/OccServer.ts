import type { DelayModel } from '../engine/DelayModel.js';
import type { Delivery, ReadRequest, WriteRequest } from '../engine/InternalTypes.js';
import type { RunStats } from '../engine/RunStats.js';
import type { TraceSink } from '../engine/TraceSink.js';

// OCC server: a single row guarded by a version number.
// A write commits only when it carries the version the row currently has; the row's version then moves on by one.
// Every write counts as a call, mismatches also count as failures. Replies travel back through the delay model.
export class OccServer {
  private version = 0;

  constructor(
    private readonly net: DelayModel,
    private readonly stats: RunStats,
    private readonly trace?: TraceSink,
  ) {}

  getVersion(): number {
    return this.version;
  }

  read(now: number, request: ReadRequest): Delivery {
    return {
      deliverAt: now + this.net.delay(),
      message: { type: request.replyTo, clientId: request.clientId, version: this.version },
    };
  }

  write(now: number, request: WriteRequest): Delivery {
    this.stats.calls += 1;
    let success = false;
    if (request.expectedVersion === this.version) {
      this.version += 1;
      success = true;
      this.trace?.record(now);
    } else {
      this.stats.failures += 1;
    }

    return {
      deliverAt: now + this.net.delay(),
      message: { type: request.replyTo, clientId: request.clientId, success },
    };
  }
}
