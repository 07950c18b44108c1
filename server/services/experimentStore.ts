import { randomUUID } from 'node:crypto';
import type { ExperimentSummary, StoredExperiment, SweepReport } from '../types.js';

const DEFAULT_CAPACITY = 50;

// Keeps the most recent experiment reports in memory; the oldest is evicted once capacity is reached.
export class ExperimentStore {
  private readonly experiments = new Map<string, StoredExperiment>();

  constructor(
    private readonly capacity = DEFAULT_CAPACITY,
    private readonly generateId: () => string = randomUUID
  ) {}

  add(report: SweepReport, createdAt = new Date()): StoredExperiment {
    const stored: StoredExperiment = {
      experimentId: this.generateId(),
      createdAt: createdAt.toISOString(),
      report
    };
    this.experiments.set(stored.experimentId, stored);

    while (this.experiments.size > this.capacity) {
      const oldest = this.experiments.keys().next();
      if (oldest.done) break;
      this.experiments.delete(oldest.value);
    }
    return stored;
  }

  get(experimentId: string): StoredExperiment | undefined {
    return this.experiments.get(experimentId);
  }

  list(): ExperimentSummary[] {
    return [...this.experiments.values()].map((experiment) => ({
      experimentId: experiment.experimentId,
      createdAt: experiment.createdAt,
      rowCount: experiment.report.rows.length
    }));
  }
}
