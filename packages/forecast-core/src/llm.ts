import { createOpenAI } from '@ai-sdk/openai';

import { ConfigurationError } from './errors.js';

/**
 * LLM client configuration for AI Gateway
 */
export interface LLMClientConfig {
  baseUrl: string;
  apiKey: string;
}

/**
 * Create an LLM provider with explicit configuration (for AI Gateway)
 * @param config - Base URL and API key for AI Gateway
 */
export function createLLMClient(config: LLMClientConfig) {
  if (!config.baseUrl) {throw new Error('AI Gateway base URL is required');}
  if (!config.apiKey) {throw new Error('AI Gateway API key is required');}

  return createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
  });
}

/**
 * Read a required environment variable
 * @param name - Variable name
 * @param environment - Environment to read from
 * @throws ConfigurationError when unset or empty
 */
export function requireEnvironment(name: string, environment: NodeJS.ProcessEnv = process.env): string {
  // eslint-disable-next-line security/detect-object-injection -- name is a fixed variable name
  const value = environment[name];
  if (value === undefined || value === '') {
    throw new ConfigurationError(`${name} environment variable is required`);
  }
  return value;
}

/**
 * Get LLM provider from environment variables
 * @param environment - Environment to read from
 */
export function getLLMClient(environment: NodeJS.ProcessEnv = process.env) {
  return createLLMClient({
    baseUrl: requireEnvironment('AI_GATEWAY_BASE_URL', environment),
    apiKey: requireEnvironment('AI_GATEWAY_API_KEY', environment),
  });
}
