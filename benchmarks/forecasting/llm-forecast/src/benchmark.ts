import { randomUUID } from 'node:crypto';

import { createBenchmarkLogger } from '@llmcast/cli-utils';
import {
  closeDatabase,
  DatabaseForecastCache,
  isDatabaseConfigured,
} from '@llmcast/database';
import {
  createCompletionClient,
  ForecastError,
  MemoryForecastCache,
} from '@llmcast/forecast-core';
import { saveScore } from '@llmcast/scorers';
import { config } from 'dotenv';

import { parseBenchmarkArguments } from './cli-arguments.js';
import { createEngine, loadModelMatrix, selectModels } from './matrix.js';
import { runModel } from './run.js';
import { printLeaderboard } from './table.js';
import { loadTasks } from './tasks.js';

import type { ModelSummary } from './run.js';
import type { BenchmarkLogger } from '@llmcast/cli-utils';
import type { ForecastCache } from '@llmcast/forecast-core';

config();

// Replaced once the command line is parsed; used as-is if parsing fails
let logger: BenchmarkLogger = createBenchmarkLogger();

/**
 * Run every selected model over every task and print the leaderboard
 *
 * @returns true when every model completed at least one task
 */
async function main(): Promise<boolean> {
  const arguments_ = parseBenchmarkArguments(process.argv.slice(2));
  logger = createBenchmarkLogger(arguments_.verbose);
  const runId = randomUUID();
  const persist = isDatabaseConfigured();

  logger.header('LLM Forecast Benchmark');
  logger.objective('Probabilistic forecasts from sampled LLM completions, ranked by scaled CRPS');

  const tasks = await loadTasks(arguments_.tasksPath);
  const models = selectModels(loadModelMatrix(), arguments_.models);

  logger.logBenchmarkInfo({
    tasks: tasks.length,
    samples: arguments_.samples,
    profile: arguments_.profile,
    models: models.map((model) => model.id),
  });
  logger.explainMetrics();

  let cache: ForecastCache | undefined;
  if (arguments_.useCache) {
    cache = persist ? new DatabaseForecastCache() : new MemoryForecastCache();
  }

  const summaries: ModelSummary[] = [];
  for (const [index, model] of models.entries()) {
    logger.logModelStart(model.id, index + 1, models.length);
    logger.startSpinner(`Acquiring ${String(arguments_.samples)} samples per task...`);

    let summary: ModelSummary;
    try {
      const engine = createEngine(model, createCompletionClient(model.backend), arguments_.samples, logger);
      summary = await runModel(engine, {
        tasks,
        samples: arguments_.samples,
        profile: arguments_.profile,
        logger,
        cache,
        onScore: persist
          ? (score) => saveScore({
            runId,
            modelId: model.id,
            taskId: score.taskId,
            scorerId: 'crps',
            result: score.result,
          })
          : undefined,
      });
    } catch (error) {
      // Backend configuration errors disable the model, not the run
      if (!(error instanceof ForecastError)) {
        throw error;
      }
      const { message } = error;
      logger.failSpinner(model.id);
      logger.error(message);
      summaries.push({
        modelId: model.id,
        scores: [],
        failures: tasks.map((task) => ({ taskId: task.id, message })),
        meanCrps: Number.NaN,
        inputTokens: 0,
        outputTokens: 0,
        cost: undefined,
      });
      continue;
    }

    if (summary.failures.length === tasks.length) {
      logger.failSpinner(`${model.id}: every task failed`);
    } else {
      logger.succeedSpinner(`${model.id}: ${String(summary.scores.length)}/${String(tasks.length)} tasks`);
    }
    logger.logModelScoreCompact(model.id, summary.meanCrps, summary.scores.length, tasks.length);
    summaries.push(summary);
  }

  logger.newline();
  printLeaderboard(summaries, tasks.length);

  const failedTasks = summaries.reduce((sum, summary) => sum + summary.failures.length, 0);
  logger.summary({
    'Run': runId,
    'Models': String(summaries.length),
    'Failed tasks': String(failedTasks),
    'Total cost (USD)': summaries.reduce((sum, summary) => sum + (summary.cost ?? 0), 0),
  });
  if (!persist) {
    logger.hint('Set DATABASE_URL to persist scores and cache samples across runs.');
  }

  return summaries.every((summary) => summary.scores.length > 0);
}

// Use top-level await pattern for CLI
await main()
  .then(async (allModelsScored) => {
    await closeDatabase();
    // eslint-disable-next-line unicorn/no-process-exit -- CLI must exit explicitly to close backend sockets
    process.exit(allModelsScored ? 0 : 1);
  })
  .catch(async (error: unknown) => {
    logger.failSpinner();
    logger.error(`Benchmark failed: ${error instanceof Error ? error.message : String(error)}`);
    await closeDatabase();
    // eslint-disable-next-line unicorn/no-process-exit -- CLI exit code
    process.exit(1);
  });
