import type { TokenCost, UsageCounters } from './types.js';

/**
 * Estimate the monetary cost of the given usage, rounded to cents
 * @param usage - Cumulative token counts
 * @param tokenCost - Price per 1000 input and output tokens
 */
export function estimateCost(usage: UsageCounters, tokenCost: TokenCost): number {
  const inputCost = (usage.inputTokens / 1000) * tokenCost.input;
  const outputCost = (usage.outputTokens / 1000) * tokenCost.output;
  return Math.round((inputCost + outputCost) * 100) / 100;
}

export function emptyUsage(): UsageCounters {
  return { inputTokens: 0, outputTokens: 0 };
}
