import { applyContextProfile, CONTEXT_PROFILES } from '@llmcast/forecast-core';
import { crpsScorer, meanAbsoluteScale } from '@llmcast/scorers';

import type { BenchmarkTask } from './tasks.js';
import type { BenchmarkLogger } from '@llmcast/cli-utils';
import type {
  AcquisitionResult,
  ContextProfileId,
  ForecastCache,
  ForecastEngine,
} from '@llmcast/forecast-core';
import type { CrpsResult } from '@llmcast/scorers';

export interface TaskScore {
  taskId: string;
  result: CrpsResult;
  cached: boolean;
}

export interface TaskFailure {
  taskId: string;
  message: string;
}

export interface ModelSummary {
  modelId: string;
  scores: TaskScore[];
  failures: TaskFailure[];
  /** Mean scaled CRPS over completed tasks, NaN when none completed */
  meanCrps: number;
  inputTokens: number;
  outputTokens: number;
  /** Estimated cost of fresh acquisitions; undefined for models without prices */
  cost: number | undefined;
}

export type RunLogger = Pick<BenchmarkLogger, 'logAcquisition' | 'logScore' | 'error'>;

export interface RunModelOptions {
  tasks: BenchmarkTask[];
  samples: number;
  profile: ContextProfileId;
  logger: RunLogger;
  cache?: ForecastCache | undefined;
  /** Called once per scored task, e.g. to persist the score */
  onScore?: ((score: TaskScore) => Promise<void>) | undefined;
}

/**
 * Cache entries are namespaced by profile since the profile changes the prompt
 */
export function cacheTaskId(taskId: string, profile: ContextProfileId): string {
  return `${taskId}#${profile}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

async function acquireWithCache(
  engine: ForecastEngine,
  task: BenchmarkTask,
  options: RunModelOptions
): Promise<{ result: AcquisitionResult; cached: boolean; rejected: number }> {
  const instance = applyContextProfile(task.instance, CONTEXT_PROFILES[options.profile]);
  const entryId = cacheTaskId(task.id, options.profile);

  const stored = await options.cache?.get(engine.cacheKey, entryId);
  if (stored !== undefined && stored.samples.length >= options.samples) {
    return {
      result: { ...stored, samples: stored.samples.slice(0, options.samples) },
      cached: true,
      rejected: stored.rawOutputs.length - stored.samples.length,
    };
  }

  const result = await engine.acquire(instance, options.samples);
  await options.cache?.set(engine.cacheKey, entryId, result);
  return { result, cached: false, rejected: result.rawOutputs.length - result.samples.length };
}

/**
 * Acquire, score and log every task for one model. A failing task is recorded
 * and the remaining tasks still run.
 */
export async function runModel(engine: ForecastEngine, options: RunModelOptions): Promise<ModelSummary> {
  const { logger } = options;
  const summary: ModelSummary = {
    modelId: engine.settings.model,
    scores: [],
    failures: [],
    meanCrps: Number.NaN,
    inputTokens: 0,
    outputTokens: 0,
    cost: undefined,
  };

  for (const task of options.tasks) {
    try {
      const { result, cached, rejected } = await acquireWithCache(engine, task, options);

      logger.logAcquisition({
        taskId: task.id,
        samples: result.samples.length,
        requested: options.samples,
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
        rejected,
        cost: result.cost,
        cached,
      });

      if (!cached) {
        summary.inputTokens += result.usage.inputTokens;
        summary.outputTokens += result.usage.outputTokens;
        if (result.cost !== undefined) {
          summary.cost = (summary.cost ?? 0) + result.cost;
        }
      }

      const score: TaskScore = {
        taskId: task.id,
        result: await crpsScorer.score({
          samples: result.samples,
          target: task.target,
          scale: meanAbsoluteScale(task.instance.pastTime.map((point) => point.value)),
        }),
        cached,
      };
      summary.scores.push(score);
      logger.logScore(task.id, score.result.score);

      if (options.onScore !== undefined) {
        // A persistence failure is reported but does not void the score
        await options.onScore(score).catch((error: unknown) => {
          logger.error(`Failed to save score for ${summary.modelId} / ${task.id}: ${describeError(error)}`);
        });
      }
    } catch (error) {
      const message = describeError(error);
      summary.failures.push({ taskId: task.id, message });
      logger.error(`${summary.modelId} / ${task.id}: ${message}`);
    }
  }

  if (summary.scores.length > 0) {
    summary.meanCrps = summary.scores.reduce((sum, score) => sum + score.result.score, 0) / summary.scores.length;
  }
  return summary;
}
