import type { DelayConfig } from '../types/simulation.js';
import { normal, type RandomSource } from './Random.js';

// Network delay model: a folded normal distribution.
// Real links look more like a Weibull, but the fold is close enough to compare backoff strategies.
export class DelayModel {
  constructor(
    private readonly config: DelayConfig,
    private readonly rng: RandomSource,
  ) {}

  delay(): number {
    return Math.abs(normal(this.rng, this.config.mean, this.config.stddev));
  }
}
