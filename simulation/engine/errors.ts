// Raised when the engine detects a scheduling defect. A run that hits one is discarded.
export class SimulationInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationInvariantError';
  }
}

export class SimulationLimitError extends Error {
  readonly processed: number;

  constructor(processed: number) {
    super(`Run aborted after ${processed} deliveries`);
    this.name = 'SimulationLimitError';
    this.processed = processed;
  }
}
