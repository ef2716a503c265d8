import { and, eq } from 'drizzle-orm';
import { z } from 'zod';

import { getDatabase } from './client.js';
import { forecastCache } from './schema/forecast-cache.js';

import type { AcquisitionResult, ForecastCache } from '@llmcast/forecast-core';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';

const TokenCostSchema = z.object({
  input: z.number(),
  output: z.number(),
});

/**
 * Shape of a cached acquisition as stored in the `result` jsonb column
 */
export const StoredAcquisitionSchema = z.object({
  samples: z.array(z.array(z.array(z.number()))),
  usage: z.object({
    inputTokens: z.number(),
    outputTokens: z.number(),
  }),
  rawOutputs: z.array(z.string()),
  cost: z.number().optional(),
  tokenCost: TokenCostSchema.optional(),
  timing: z.object({
    totalMs: z.number(),
    clientMs: z.number(),
  }),
}) satisfies z.ZodType<AcquisitionResult>;

/**
 * Forecast cache persisted in the `forecast_cache` table.
 * Rows that no longer match the stored shape are treated as misses and
 * overwritten on the next `set`.
 */
export class DatabaseForecastCache implements ForecastCache {
  private readonly database: PostgresJsDatabase;

  constructor(database: PostgresJsDatabase = getDatabase()) {
    this.database = database;
  }

  async get(cacheKey: string, taskId: string): Promise<AcquisitionResult | undefined> {
    const rows = await this.database
      .select({ result: forecastCache.result })
      .from(forecastCache)
      .where(and(eq(forecastCache.cacheKey, cacheKey), eq(forecastCache.taskId, taskId)))
      .limit(1);

    const row = rows[0];
    if (row === undefined) {
      return undefined;
    }

    const parsed = StoredAcquisitionSchema.safeParse(row.result);
    return parsed.success ? parsed.data : undefined;
  }

  async set(cacheKey: string, taskId: string, result: AcquisitionResult): Promise<void> {
    await this.database
      .insert(forecastCache)
      .values({
        cacheKey,
        taskId,
        nSamples: result.samples.length,
        result,
      })
      .onConflictDoUpdate({
        target: [forecastCache.cacheKey, forecastCache.taskId],
        set: {
          nSamples: result.samples.length,
          result,
          createdAt: new Date(),
        },
      });
  }
}
