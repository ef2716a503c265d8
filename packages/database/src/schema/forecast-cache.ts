import { pgTable, uuid, text, jsonb, integer, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';

export const forecastCache = pgTable('forecast_cache', {
  id: uuid('id').primaryKey().defaultRandom(),
  cacheKey: text('cache_key').notNull(),
  taskId: text('task_id').notNull(),
  nSamples: integer('n_samples').notNull(),
  result: jsonb('result').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  uniqueIndex('forecast_cache_key_task_idx').on(table.cacheKey, table.taskId),
]);
