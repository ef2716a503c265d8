/**
 * A single observed point of the history
 */
export interface HistoryPoint {
  timestamp: Date;
  value: number;
}

/**
 * Read-only view of one forecasting task instance
 */
export interface TaskInstance {
  readonly pastTime: readonly HistoryPoint[];
  readonly futureTime: readonly Date[];
  readonly background?: string;
  readonly constraints?: string;
  readonly scenario?: string;
  /** Upper bound on candidates per generation request */
  readonly maxBatchSize?: number;
}

/**
 * Chat message sent to a completion backend
 */
export interface Message {
  role: 'system' | 'user';
  content: string;
}

export type Conversation = readonly Message[];

/**
 * Request shape shared by every completion backend
 */
export interface CompletionRequest {
  model: string;
  messages: Conversation;
  n: number;
  maxTokens: number;
  temperature: number;
}

export interface CompletionChoice {
  content: string;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
}

/**
 * Response shape shared by every completion backend
 */
export interface CompletionResponse {
  choices: CompletionChoice[];
  usage: CompletionUsage;
}

/**
 * Backend able to draw `n` candidate completions for one conversation
 */
export interface CompletionClient {
  generate(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Price per 1000 tokens
 */
export interface TokenCost {
  input: number;
  output: number;
}

export interface UsageCounters {
  inputTokens: number;
  outputTokens: number;
}

export interface AcquisitionTiming {
  /** Wall-clock time of the whole acquisition */
  totalMs: number;
  /** Time spent inside generation calls */
  clientMs: number;
}

/**
 * Outcome of one acquisition call
 */
export interface AcquisitionResult {
  /** Sample paths, shape [n, H, 1] */
  samples: number[][][];
  usage: UsageCounters;
  /** Every generated text, valid or not, in emission order */
  rawOutputs: string[];
  cost?: number;
  tokenCost?: TokenCost;
  timing: AcquisitionTiming;
}

/**
 * Sink for engine progress messages
 */
export interface ForecastLogger {
  log(message: string): void;
}
