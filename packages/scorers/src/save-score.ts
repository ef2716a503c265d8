import { getDatabase, scorerResults } from '@llmcast/database';

import type { SaveScoreParams } from './types.js';

/**
 * Save a score result to the database
 */
export async function saveScore(params: SaveScoreParams): Promise<void> {
  const database = getDatabase();
  await database.insert(scorerResults).values({
    runId: params.runId,
    modelId: params.modelId,
    taskId: params.taskId,
    scorerId: params.scorerId,
    score: params.result.score,
    result: params.result,
  });
}
