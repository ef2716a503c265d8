import { pgTable, uuid, text, real, jsonb, timestamp, index } from 'drizzle-orm/pg-core';

export const scorerResults = pgTable('scorer_results', {
  id: uuid('id').primaryKey().defaultRandom(),
  runId: text('run_id').notNull(),
  modelId: text('model_id').notNull(),
  taskId: text('task_id').notNull(),
  scorerId: text('scorer_id').notNull(),
  score: real('score').notNull(),
  result: jsonb('result').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => [
  index('scorer_results_run_idx').on(table.runId),
  index('scorer_results_model_scorer_time_idx').on(table.modelId, table.scorerId, table.createdAt),
]);
