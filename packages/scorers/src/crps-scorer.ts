import { defineScorer } from './define-scorer.js';

import type { ScorerResult } from './types.js';

export interface CrpsInput {
  /** Sample paths, shape [n, H, 1] */
  samples: readonly (readonly (readonly number[])[])[];
  /** Realised values, length H */
  target: readonly number[];
  /** Positive divisor applied to the mean CRPS, e.g. the mean absolute history value */
  scale?: number;
}

export interface CrpsResult extends ScorerResult {
  /** Mean CRPS across the horizon, before scaling */
  crps: number;
  perStep: number[];
  scale: number;
}

/**
 * Empirical CRPS of a sample set against one observation:
 * E|X - y| - ½ E|X - X'|
 */
export function empiricalCrps(values: readonly number[], observation: number): number {
  const n = values.length;
  let absoluteError = 0;
  let spread = 0;
  for (const value of values) {
    absoluteError += Math.abs(value - observation);
    for (const other of values) {
      spread += Math.abs(value - other);
    }
  }
  return absoluteError / n - spread / (2 * n * n);
}

function valuesAtStep(samples: CrpsInput['samples'], step: number): number[] {
  return samples.map((path, index) => {
    const value = path[step]?.[0];
    if (value === undefined) {
      throw new Error(`Sample ${String(index)} has no value at step ${String(step)}`);
    }
    return value;
  });
}

/**
 * Sample-based CRPS averaged over the forecast horizon. Lower is better.
 */
export const crpsScorer = defineScorer<CrpsInput, CrpsResult>({
  id: 'crps',
  name: 'Continuous Ranked Probability Score',
  score({ samples, target, scale = 1 }) {
    if (samples.length === 0) {
      throw new Error('Cannot score an empty sample set');
    }
    if (target.length === 0) {
      throw new Error('Cannot score an empty target');
    }
    if (!(scale > 0) || !Number.isFinite(scale)) {
      throw new Error(`Scale must be a positive number, got ${String(scale)}`);
    }

    const perStep = target.map((observation, step) => empiricalCrps(valuesAtStep(samples, step), observation));
    const crps = perStep.reduce((sum, value) => sum + value, 0) / perStep.length;

    return { score: crps / scale, crps, perStep, scale };
  },
});

/**
 * Mean absolute value of a series, used to make CRPS comparable across tasks.
 * Falls back to 1 for an all-zero or empty series.
 */
export function meanAbsoluteScale(values: readonly number[]): number {
  if (values.length === 0) {
    return 1;
  }
  const mean = values.reduce((sum, value) => sum + Math.abs(value), 0) / values.length;
  return mean > 0 ? mean : 1;
}
