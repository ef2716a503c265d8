import { BACKEND_KINDS, ConfigurationError, ForecastEngine } from '@llmcast/forecast-core';
import { z } from 'zod';

import modelsJson from './models.json' with { type: 'json' };

import type { CompletionClient, ForecastLogger } from '@llmcast/forecast-core';

const ModelConfigSchema = z.object({
  id: z.string().min(1),
  backend: z.enum(BACKEND_KINDS),
  hosted: z.boolean(),
  /** USD per 1000 prompt tokens; omitted for self-hosted models */
  inputCostPer1k: z.number().nonnegative().optional(),
  outputCostPer1k: z.number().nonnegative().optional(),
  temperature: z.number().min(0).optional(),
});

const ModelsFileSchema = z.object({
  models: z.array(ModelConfigSchema).min(1),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/**
 * Load the model matrix
 *
 * @param data - Parsed models file, defaults to the bundled models.json
 * @throws ConfigurationError when the file does not match the expected shape
 */
export function loadModelMatrix(data: unknown = modelsJson): ModelConfig[] {
  const parsed = ModelsFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid model matrix: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data.models;
}

/**
 * Restrict the matrix to the requested model ids, in request order
 *
 * @throws ConfigurationError for an id missing from the matrix
 */
export function selectModels(matrix: ModelConfig[], requested: string[] | undefined): ModelConfig[] {
  if (requested === undefined) {
    return matrix;
  }
  return requested.map((id) => {
    const model = matrix.find((candidate) => candidate.id === id);
    if (model === undefined) {
      throw new ConfigurationError(`Unknown model "${id}". Known models: ${matrix.map((m) => m.id).join(', ')}`);
    }
    return model;
  });
}

// Engine default for the follow-up batch size
const RETRY_BATCH_SIZE = 5;

/**
 * Build the acquisition engine for one matrix entry. The follow-up batch never
 * exceeds the sample count, so small runs stay valid.
 */
export function createEngine(
  model: ModelConfig,
  client: CompletionClient,
  samples: number,
  logger?: ForecastLogger
): ForecastEngine {
  const tokenCost = model.inputCostPer1k === undefined || model.outputCostPer1k === undefined
    ? undefined
    : { input: model.inputCostPer1k, output: model.outputCostPer1k };

  return new ForecastEngine({
    model: model.id,
    hosted: model.hosted,
    batchSizeOnRetry: Math.min(RETRY_BATCH_SIZE, samples),
    client,
    ...(tokenCost === undefined ? {} : { tokenCost }),
    ...(model.temperature === undefined ? {} : { temperature: model.temperature }),
    ...(logger === undefined ? {} : { logger }),
  });
}
