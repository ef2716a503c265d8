import { describe, it, expect, vi, beforeEach } from 'vitest';
import { scorerResults } from '@llmcast/database';

import { saveScore } from '../src/save-score.js';

const { values, insert } = vi.hoisted(() => {
  const values = vi.fn();
  const insert = vi.fn(() => ({ values }));
  return { values, insert };
});

vi.mock('@llmcast/database', () => ({
  getDatabase: vi.fn(() => ({ insert })),
  scorerResults: { table: 'scorer_results' },
}));

describe('saveScore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    values.mockResolvedValue(undefined);
  });

  it('inserts one scorer_results row', async () => {
    const result = { score: 0.25, crps: 0.5, perStep: [0.5], scale: 2 };

    await saveScore({
      runId: 'run-1',
      modelId: 'openai/gpt-4o-mini',
      taskId: 'task-1',
      scorerId: 'crps',
      result,
    });

    expect(insert).toHaveBeenCalledWith(scorerResults);
    expect(values).toHaveBeenCalledWith({
      runId: 'run-1',
      modelId: 'openai/gpt-4o-mini',
      taskId: 'task-1',
      scorerId: 'crps',
      score: 0.25,
      result,
    });
  });
});
