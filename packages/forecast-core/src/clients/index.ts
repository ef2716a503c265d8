import { ConfigurationError } from '../errors.js';
import { getLLMClient } from '../llm.js';

import { GatewayCompletionClient } from './gateway-client.js';
import {
  getOpenAICompatibleConfig,
  OpenAICompatibleCompletionClient,
} from './openai-compatible-client.js';

import type { CompletionClient } from '../types.js';

export const BACKEND_KINDS = ['gateway', 'openai-compatible'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

/**
 * Type guard for backend identifiers read from configuration
 * @param value - Candidate identifier
 */
export function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

/**
 * Create the completion client for a backend, reading its settings from the environment
 * @param backend - Backend identifier
 * @param environment - Environment to read from
 * @throws ConfigurationError for an unknown backend
 */
export function createCompletionClient(
  backend: string,
  environment: NodeJS.ProcessEnv = process.env
): CompletionClient {
  if (!isBackendKind(backend)) {
    throw new ConfigurationError(`Backend "${backend}" not supported.`);
  }

  switch (backend) {
    case 'gateway': {
      return new GatewayCompletionClient(getLLMClient(environment));
    }
    case 'openai-compatible': {
      return new OpenAICompatibleCompletionClient(getOpenAICompatibleConfig(environment));
    }
  }
}

export { GatewayCompletionClient } from './gateway-client.js';
export { OpenAICompatibleCompletionClient, getOpenAICompatibleConfig } from './openai-compatible-client.js';
export type { OpenAICompatibleConfig } from './openai-compatible-client.js';
