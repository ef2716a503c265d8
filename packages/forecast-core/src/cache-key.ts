/**
 * Bumped whenever a change to prompting or parsing should invalidate cached results
 */
export const ENGINE_VERSION = '0.0.5';

export interface CacheKeyParameters {
  model: string;
  useContext: boolean;
  failOnInvalid: boolean;
  nRetries: number;
  temperature: number;
  /** Hosted models ignore temperature in the key */
  hosted: boolean;
}

/**
 * Build the deterministic key under which acquisition results are cached.
 * Batch sizes and token prices never participate.
 * @param parameters - Engine settings that affect the generated samples
 */
export function buildCacheKey(parameters: CacheKeyParameters): string {
  const parts: [string, string | number | boolean][] = [
    ['model', parameters.model],
    ['useContext', parameters.useContext],
    ['failOnInvalid', parameters.failOnInvalid],
    ['nRetries', parameters.nRetries],
  ];
  if (!parameters.hosted) {
    parts.push(['temperature', parameters.temperature]);
  }

  const body = parts.map(([name, value]) => `${name}=${String(value)}`).join('_');
  return `LLMForecaster-v${ENGINE_VERSION}_${body}`;
}
