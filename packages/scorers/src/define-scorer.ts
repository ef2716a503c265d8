import type { Scorer, ScorerResult } from './types.js';

/**
 * Create a typed scorer. Identity at runtime; pins `TInput` and `TResult`
 * so callers get the concrete result type back from `score`.
 */
export function defineScorer<TInput, TResult extends ScorerResult = ScorerResult>(
  definition: Scorer<TInput, TResult>
): Scorer<TInput, TResult> {
  return definition;
}
