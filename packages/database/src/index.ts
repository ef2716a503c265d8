/**
 * Database client and schema for the forecasting benchmark
 */

export { getDatabase, closeDatabase, isDatabaseConfigured } from './client.js';
export { DatabaseForecastCache, StoredAcquisitionSchema } from './forecast-cache.js';
export { forecastCache } from './schema/forecast-cache.js';
export { scorerResults } from './schema/scorer-results.js';
