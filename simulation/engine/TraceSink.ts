// Receives the simulated time of every successful write.
export interface TraceSink {
  record(simTime: number): void;
  flush?(): Promise<void>;
}

export class MemoryTraceSink implements TraceSink {
  private readonly times: number[] = [];

  record(simTime: number): void {
    this.times.push(simTime);
  }

  getTimes(): readonly number[] {
    return this.times;
  }
}
