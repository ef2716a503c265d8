/**
 * Forecast core
 *
 * Turns a time-series task instance into a validated batch of sample paths by
 * rejection sampling against an instruction-tuned language model.
 */

// Acquisition engine
export { ForecastEngine, parseEngineSettings } from './engine.js';
export type { EngineSettings, ForecastEngineOptions } from './engine.js';

// Prompting and parsing
export { buildPrompt, buildContextBlock, serializeHistory, SYSTEM_PROMPT, DEFAULT_MAX_DIGITS } from './prompt-builder.js';
export type { BuiltPrompt, PromptOptions } from './prompt-builder.js';
export { parseForecast, extractForecastBlock, parseForecastPairs } from './response-parser.js';
export { formatGeneral, formatValue, formatTimestamp } from './number-format.js';

// Context profiles
export {
  CONTEXT_FIELDS,
  CONTEXT_PROFILES,
  applyContextProfile,
  isContextProfileId,
} from './context-profile.js';
export type { ContextField, ContextProfile, ContextProfileId } from './context-profile.js';

// Errors
export {
  ForecastError,
  ConfigurationError,
  FormatError,
  InsufficientSamplesError,
  BackendError,
} from './errors.js';
export type { ForecastErrorCode } from './errors.js';

// Cost, caching
export { estimateCost, emptyUsage } from './cost.js';
export { buildCacheKey, ENGINE_VERSION } from './cache-key.js';
export type { CacheKeyParameters } from './cache-key.js';
export { MemoryForecastCache } from './forecast-cache.js';
export type { ForecastCache } from './forecast-cache.js';

// Completion backends
export {
  BACKEND_KINDS,
  createCompletionClient,
  isBackendKind,
  GatewayCompletionClient,
  OpenAICompatibleCompletionClient,
  getOpenAICompatibleConfig,
} from './clients/index.js';
export type { BackendKind, OpenAICompatibleConfig } from './clients/index.js';
export type { LLMClientConfig } from './llm.js';
export { createLLMClient, getLLMClient, requireEnvironment } from './llm.js';

// Types
export type {
  AcquisitionResult,
  AcquisitionTiming,
  CompletionChoice,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  CompletionUsage,
  Conversation,
  ForecastLogger,
  HistoryPoint,
  Message,
  TaskInstance,
  TokenCost,
  UsageCounters,
} from './types.js';
