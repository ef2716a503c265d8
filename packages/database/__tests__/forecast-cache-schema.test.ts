import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';

import { forecastCache } from '../src/schema/forecast-cache.js';

describe('forecastCache schema', () => {
  it('exports a table with correct name', () => {
    expect(getTableName(forecastCache)).toBe('forecast_cache');
  });

  it('has correct column types', () => {
    const { id, cacheKey, taskId, nSamples, result, createdAt } = forecastCache;

    expect(id.dataType).toBe('string'); // uuid
    expect(cacheKey.dataType).toBe('string');
    expect(taskId.dataType).toBe('string');
    expect(nSamples.dataType).toBe('number');
    expect(result.dataType).toBe('json');
    expect(createdAt.dataType).toBe('date');
  });

  it('requires key, task and result', () => {
    expect(forecastCache.cacheKey.notNull).toBe(true);
    expect(forecastCache.taskId.notNull).toBe(true);
    expect(forecastCache.result.notNull).toBe(true);
  });
});
