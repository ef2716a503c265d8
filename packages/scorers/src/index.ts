/**
 * Scorers for sampled forecasts
 */

export { defineScorer } from './define-scorer.js';
export { crpsScorer, empiricalCrps, meanAbsoluteScale } from './crps-scorer.js';
export type { CrpsInput, CrpsResult } from './crps-scorer.js';
export { saveScore } from './save-score.js';
export type { Scorer, ScorerResult, SaveScoreParams } from './types.js';
