import { formatTimestamp, formatValue } from './number-format.js';

import type { Conversation, TaskInstance } from './types.js';

export const SYSTEM_PROMPT = 'You are a useful forecasting assistant.';

export const DEFAULT_MAX_DIGITS = 6;

export interface PromptOptions {
  useContext: boolean;
  maxDigits?: number;
}

export interface BuiltPrompt {
  messages: Conversation;
  /** Target timestamps exactly as written in the prompt */
  targetTimestamps: string[];
}

/**
 * Serialize the history as one `(timestamp, value)` pair per line
 * @param task - Task instance
 * @param maxDigits - Maximum significant digits per value
 */
export function serializeHistory(task: TaskInstance, maxDigits: number): string {
  return task.pastTime
    .map((point) => `(${formatTimestamp(point.timestamp)}, ${formatValue(point.value, maxDigits)})`)
    .join('\n');
}

/**
 * Build the context block from whichever text fields the task carries
 * @param task - Task instance
 */
export function buildContextBlock(task: TaskInstance): string {
  let context = '';
  if (task.background !== undefined && task.background !== '') {
    context += `Background: ${task.background}\n`;
  }
  if (task.constraints !== undefined && task.constraints !== '') {
    context += `Constraints: ${task.constraints}\n`;
  }
  if (task.scenario !== undefined && task.scenario !== '') {
    context += `Scenario: ${task.scenario}\n`;
  }
  return context;
}

/**
 * Build the forecasting conversation for a task instance.
 * Pure: the same task and options always give the same messages.
 * @param task - Task instance to forecast
 * @param options - Context usage and numeric precision
 * @returns Messages and the target timestamps the model must answer for
 */
export function buildPrompt(task: TaskInstance, options: PromptOptions): BuiltPrompt {
  const maxDigits = options.maxDigits ?? DEFAULT_MAX_DIGITS;
  const history = serializeHistory(task, maxDigits);
  const context = options.useContext ? buildContextBlock(task) : '';
  const targetTimestamps = task.futureTime.map((timestamp) => formatTimestamp(timestamp));
  const targetList = targetTimestamps.map((timestamp) => `'${timestamp}'`).join(' ');

  const prompt = `
I have a time series forecasting task for you.

Here is some context about the task. Make sure to factor in any background knowledge,
satisfy any constraints, and respect any scenarios.
<context>
${context}
</context>

Here is a historical time series in (timestamp, value) format:
<history>
${history}
</history>

Now please predict the value at the following timestamps: [${targetList}].

Return the forecast in (timestamp, value) format in between <forecast> and </forecast> tags.
Do not include any other information (e.g., comments) in the forecast.

Example:
<history>
(t1, v1)
(t2, v2)
(t3, v3)
</history>
<forecast>
(t4, v4)
(t5, v5)
</forecast>

`;

  return {
    messages: [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ],
    targetTimestamps,
  };
}
