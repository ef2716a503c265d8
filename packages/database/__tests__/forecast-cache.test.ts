import { describe, it, expect, vi } from 'vitest';

import { DatabaseForecastCache, StoredAcquisitionSchema } from '../src/forecast-cache.js';
import { forecastCache } from '../src/schema/forecast-cache.js';

import type { AcquisitionResult } from '@llmcast/forecast-core';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';

const RESULT: AcquisitionResult = {
  samples: [[[1], [2]], [[1.5], [2.5]]],
  usage: { inputTokens: 300, outputTokens: 120 },
  rawOutputs: ['<forecast>…</forecast>', 'not a forecast', '<forecast>…</forecast>'],
  cost: 0.01,
  tokenCost: { input: 0.005, output: 0.02 },
  timing: { totalMs: 42, clientMs: 40 },
};

function fakeDatabase(rows: { result: unknown }[]) {
  const limit = vi.fn().mockResolvedValue(rows);
  const where = vi.fn().mockReturnValue({ limit });
  const from = vi.fn().mockReturnValue({ where });
  const select = vi.fn().mockReturnValue({ from });

  const onConflictDoUpdate = vi.fn().mockResolvedValue(undefined);
  const values = vi.fn().mockReturnValue({ onConflictDoUpdate });
  const insert = vi.fn().mockReturnValue({ values });

  const database = { select, insert } as unknown as PostgresJsDatabase;
  return { database, select, from, limit, insert, values, onConflictDoUpdate };
}

describe('DatabaseForecastCache', () => {
  describe('get', () => {
    it('returns undefined when no row matches', async () => {
      const fake = fakeDatabase([]);
      const cache = new DatabaseForecastCache(fake.database);

      await expect(cache.get('key', 'task-1')).resolves.toBeUndefined();
      expect(fake.from).toHaveBeenCalledWith(forecastCache);
      expect(fake.limit).toHaveBeenCalledWith(1);
    });

    it('returns the stored acquisition', async () => {
      const fake = fakeDatabase([{ result: RESULT }]);
      const cache = new DatabaseForecastCache(fake.database);

      await expect(cache.get('key', 'task-1')).resolves.toEqual(RESULT);
    });

    it('treats a row of the wrong shape as a miss', async () => {
      const fake = fakeDatabase([{ result: { samples: 'corrupt' } }]);
      const cache = new DatabaseForecastCache(fake.database);

      await expect(cache.get('key', 'task-1')).resolves.toBeUndefined();
    });
  });

  describe('set', () => {
    it('upserts on (cache_key, task_id)', async () => {
      const fake = fakeDatabase([]);
      const cache = new DatabaseForecastCache(fake.database);

      await cache.set('key', 'task-1', RESULT);

      expect(fake.insert).toHaveBeenCalledWith(forecastCache);
      expect(fake.values).toHaveBeenCalledWith({
        cacheKey: 'key',
        taskId: 'task-1',
        nSamples: 2,
        result: RESULT,
      });
      expect(fake.onConflictDoUpdate).toHaveBeenCalledWith({
        target: [forecastCache.cacheKey, forecastCache.taskId],
        set: { nSamples: 2, result: RESULT, createdAt: expect.any(Date) },
      });
    });
  });
});

describe('StoredAcquisitionSchema', () => {
  it('accepts results without cost fields', () => {
    const { cost: _cost, tokenCost: _tokenCost, ...bare } = RESULT;
    expect(StoredAcquisitionSchema.safeParse(bare).success).toBe(true);
  });

  it('rejects non-numeric samples', () => {
    expect(StoredAcquisitionSchema.safeParse({ ...RESULT, samples: [[['1']]] }).success).toBe(false);
  });
});
