import { BACKOFF_VARIANTS, DEFAULT_EXPERIMENT } from '../types/simulation.js';
import type { BackoffVariant, ExperimentConfig } from '../types/simulation.js';

export type ValidationResult =
  | { ok: true; config: ExperimentConfig }
  | { ok: false; errors: string[] };

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isBackoffVariant(value: unknown): value is BackoffVariant {
  return BACKOFF_VARIANTS.some((variant) => variant === value);
}

function listOf<T>(value: unknown, guard: (item: unknown) => item is T): T[] | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const items: T[] = [];
  for (const item of value) {
    if (!guard(item)) return undefined;
    items.push(item);
  }
  return items;
}

// Missing fields fall back to the batch sweep defaults. Singular populationSize/variant are accepted
// as shorthands for one-element lists.
export function validateExperimentConfig(value: unknown, defaults: ExperimentConfig = DEFAULT_EXPERIMENT): ValidationResult {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, errors: ['Expected a JSON object'] };
  }
  const v = value as Record<string, unknown>;
  const errors: string[] = [];

  const populations = listOf(
    v.populationSize !== undefined ? [v.populationSize] : v.populations ?? defaults.populations,
    isPositiveInteger,
  );
  if (!populations) errors.push('populations must be a non-empty list of positive integers');

  const variants = listOf(v.variant !== undefined ? [v.variant] : v.variants ?? defaults.variants, isBackoffVariant);
  if (!variants) errors.push(`variants must be a non-empty list drawn from ${BACKOFF_VARIANTS.join(', ')}`);

  const repetitions = v.repetitions ?? defaults.repetitions;
  if (!isPositiveInteger(repetitions)) errors.push('repetitions must be a positive integer');

  const backoffBase = v.backoffBase ?? defaults.backoffBase;
  const backoffCap = v.backoffCap ?? defaults.backoffCap;
  if (!isPositiveNumber(backoffBase)) errors.push('backoffBase must be a positive number');
  if (!isPositiveNumber(backoffCap)) errors.push('backoffCap must be a positive number');
  if (isPositiveNumber(backoffBase) && isPositiveNumber(backoffCap) && backoffBase > backoffCap) {
    errors.push('backoffBase must not exceed backoffCap');
  }

  const delayMean = v.delayMean ?? defaults.delayMean;
  if (!isFiniteNumber(delayMean)) errors.push('delayMean must be a finite number');

  const delayStddev = v.delayStddev ?? defaults.delayStddev;
  const stddevValid = isFiniteNumber(delayStddev) && delayStddev >= 0;
  if (!stddevValid) errors.push('delayStddev must be a non-negative number');

  const seed = v.seed ?? defaults.seed;
  const seedValid = typeof seed === 'number' && Number.isInteger(seed);
  if (!seedValid) errors.push('seed must be an integer');

  const rawMaxAttempts = v.maxAttempts ?? defaults.maxAttempts;
  const maxAttempts = isPositiveInteger(rawMaxAttempts) ? rawMaxAttempts : undefined;
  if (rawMaxAttempts !== undefined && maxAttempts === undefined) {
    errors.push('maxAttempts must be a positive integer');
  }

  if (
    errors.length > 0 ||
    !populations ||
    !variants ||
    !isPositiveInteger(repetitions) ||
    !isPositiveNumber(backoffBase) ||
    !isPositiveNumber(backoffCap) ||
    !isFiniteNumber(delayMean) ||
    !isFiniteNumber(delayStddev) ||
    !isFiniteNumber(seed)
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      populations,
      variants,
      repetitions,
      backoffBase,
      backoffCap,
      delayMean,
      delayStddev,
      seed,
      ...(maxAttempts !== undefined ? { maxAttempts } : {}),
    },
  };
}
