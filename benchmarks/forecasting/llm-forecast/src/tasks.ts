import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { ConfigurationError } from '@llmcast/forecast-core';
import { z } from 'zod';

import type { HistoryPoint, TaskInstance } from '@llmcast/forecast-core';

export const DEFAULT_TASKS_PATH = fileURLToPath(new URL('../fixtures/tasks.json', import.meta.url));

const PointSchema = z.object({
  timestamp: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
  value: z.number().finite(),
});

const TaskSchema = z.object({
  id: z.string().min(1),
  history: z.array(PointSchema).min(1),
  future: z.array(PointSchema).min(1),
  background: z.string().optional(),
  constraints: z.string().optional(),
  scenario: z.string().optional(),
  maxBatchSize: z.number().int().positive().optional(),
});

const TaskFileSchema = z.object({
  tasks: z.array(TaskSchema).min(1),
});

/**
 * A task instance together with its held-out values
 */
export interface BenchmarkTask {
  id: string;
  instance: TaskInstance;
  target: number[];
}

/**
 * Validate a parsed task file and split each task into prompt input and target
 *
 * @throws ConfigurationError on malformed input or duplicate ids
 */
export function parseTaskFile(data: unknown): BenchmarkTask[] {
  const parsed = TaskFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue === undefined ? '' : ` at ${issue.path.join('.')}`;
    throw new ConfigurationError(`Invalid task file${location}: ${issue?.message ?? 'unknown error'}`);
  }

  const seen = new Set<string>();
  return parsed.data.tasks.map((task) => {
    if (seen.has(task.id)) {
      throw new ConfigurationError(`Duplicate task id "${task.id}"`);
    }
    seen.add(task.id);

    const pastTime: HistoryPoint[] = task.history;
    const instance: TaskInstance = {
      pastTime,
      futureTime: task.future.map((point) => point.timestamp),
      ...(task.background === undefined ? {} : { background: task.background }),
      ...(task.constraints === undefined ? {} : { constraints: task.constraints }),
      ...(task.scenario === undefined ? {} : { scenario: task.scenario }),
      ...(task.maxBatchSize === undefined ? {} : { maxBatchSize: task.maxBatchSize }),
    };
    return { id: task.id, instance, target: task.future.map((point) => point.value) };
  });
}

/**
 * Read and validate a JSON task file
 */
export async function loadTasks(path: string = DEFAULT_TASKS_PATH): Promise<BenchmarkTask[]> {
  const text = await readFile(path, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Task file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseTaskFile(data);
}
