import type {
  AggregateResult,
  BackoffVariant,
  ExperimentConfig,
  SweepReport
} from '../simulation/types/simulation.js';

export type { AggregateResult, BackoffVariant, ExperimentConfig, SweepReport };

export interface StoredExperiment {
  experimentId: string;
  createdAt: string;
  report: SweepReport;
}

export interface ExperimentSummary {
  experimentId: string;
  createdAt: string;
  rowCount: number;
}

export class HttpError extends Error {
  status: number;

  details?: string[];

  constructor(status: number, message: string, details?: string[]) {
    super(message);
    this.status = status;
    this.details = details;
  }
}
