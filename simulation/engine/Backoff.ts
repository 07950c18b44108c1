import type { BackoffConfig, BackoffVariant } from '../types/simulation.js';
import { uniform, type RandomSource } from './Random.js';

// Base contract for retry backoff strategies.
// expo() is the capped exponential every jittered variant builds on; subclasses only decide
// how much of it to sleep. Each client owns its own instance, so stateful variants never leak across clients.
export abstract class BackoffPolicy {
  abstract readonly variant: BackoffVariant;

  protected readonly base: number;

  protected readonly cap: number;

  constructor(config: BackoffConfig, protected readonly rng: RandomSource) {
    this.base = config.base;
    this.cap = config.cap;
  }

  abstract backoff(attempt: number): number;

  expo(attempt: number): number {
    return Math.min(this.cap, this.base * 2 ** attempt);
  }
}

export class NoBackoff extends BackoffPolicy {
  readonly variant = 'None';

  backoff(_attempt: number): number {
    return 0;
  }
}

export class ExponentialBackoff extends BackoffPolicy {
  readonly variant = 'Exponential';

  backoff(attempt: number): number {
    return this.expo(attempt);
  }
}

export class EqualJitterBackoff extends BackoffPolicy {
  readonly variant = 'EqualJitter';

  backoff(attempt: number): number {
    const v = this.expo(attempt);
    return v / 2 + uniform(this.rng, 0, v / 2);
  }
}

export class FullJitterBackoff extends BackoffPolicy {
  readonly variant = 'FullJitter';

  backoff(attempt: number): number {
    return uniform(this.rng, 0, this.expo(attempt));
  }
}

// Sleep grows from the previous sleep rather than the attempt count.
export class DecorrelatedJitterBackoff extends BackoffPolicy {
  readonly variant = 'Decorrelated';

  private lastSleep: number;

  constructor(config: BackoffConfig, rng: RandomSource) {
    super(config, rng);
    this.lastSleep = config.base;
  }

  backoff(_attempt: number): number {
    this.lastSleep = Math.min(this.cap, uniform(this.rng, this.base, this.lastSleep * 3));
    return this.lastSleep;
  }

  getLastSleep(): number {
    return this.lastSleep;
  }
}

export function createBackoff(variant: BackoffVariant, config: BackoffConfig, rng: RandomSource): BackoffPolicy {
  switch (variant) {
    case 'None':
      return new NoBackoff(config, rng);
    case 'Exponential':
      return new ExponentialBackoff(config, rng);
    case 'EqualJitter':
      return new EqualJitterBackoff(config, rng);
    case 'FullJitter':
      return new FullJitterBackoff(config, rng);
    case 'Decorrelated':
      return new DecorrelatedJitterBackoff(config, rng);
    default:
      throw new Error(`Unsupported backoff variant: ${String(variant)}`);
  }
}
