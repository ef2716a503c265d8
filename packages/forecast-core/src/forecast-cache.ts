import type { AcquisitionResult } from './types.js';

/**
 * Storage for acquisition results, keyed by engine cache key and task id
 */
export interface ForecastCache {
  get(cacheKey: string, taskId: string): Promise<AcquisitionResult | undefined>;
  set(cacheKey: string, taskId: string, result: AcquisitionResult): Promise<void>;
}

/**
 * Process-local cache, used when no database is configured
 */
export class MemoryForecastCache implements ForecastCache {
  private readonly entries = new Map<string, AcquisitionResult>();

  private static entryKey(cacheKey: string, taskId: string): string {
    return `${cacheKey}::${taskId}`;
  }

  get(cacheKey: string, taskId: string): Promise<AcquisitionResult | undefined> {
    return Promise.resolve(this.entries.get(MemoryForecastCache.entryKey(cacheKey, taskId)));
  }

  set(cacheKey: string, taskId: string, result: AcquisitionResult): Promise<void> {
    this.entries.set(MemoryForecastCache.entryKey(cacheKey, taskId), result);
    return Promise.resolve();
  }

  get size(): number {
    return this.entries.size;
  }
}
