import { z } from 'zod';

import { BackendError, ConfigurationError } from '../errors.js';
import { requireEnvironment } from '../llm.js';

import type { CompletionClient, CompletionRequest, CompletionResponse } from '../types.js';

export interface OpenAICompatibleConfig {
  baseUrl: string;
  apiKey?: string;
}

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .nullable()
    .optional(),
});

/**
 * Read the endpoint configuration from environment variables
 * @param environment - Environment to read from
 */
export function getOpenAICompatibleConfig(
  environment: NodeJS.ProcessEnv = process.env
): OpenAICompatibleConfig {
  const baseUrl = requireEnvironment('OPENAI_COMPATIBLE_BASE_URL', environment);
  const apiKey = environment['OPENAI_COMPATIBLE_API_KEY'];
  return apiKey === undefined || apiKey === '' ? { baseUrl } : { baseUrl, apiKey };
}

/**
 * Vendor-hosted or self-hosted model server exposing `/chat/completions` with native `n`.
 * Servers without token accounting report zero usage.
 */
export class OpenAICompatibleCompletionClient implements CompletionClient {
  private readonly config: OpenAICompatibleConfig;

  constructor(config: OpenAICompatibleConfig = getOpenAICompatibleConfig()) {
    if (!config.baseUrl) {
      throw new ConfigurationError('OpenAI-compatible base URL is required');
    }
    this.config = config;
  }

  async generate(request: CompletionRequest): Promise<CompletionResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey !== undefined) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const response = await fetch(`${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: request.model,
        messages: request.messages,
        n: request.n,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new BackendError(`Completion endpoint error (${String(response.status)}): ${body}`, {
        status: response.status,
        body,
      });
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError(`Unexpected completion response: ${parsed.error.message}`);
    }

    return {
      choices: parsed.data.choices.map((choice) => ({ content: choice.message.content ?? '' })),
      usage: {
        promptTokens: parsed.data.usage?.prompt_tokens ?? 0,
        completionTokens: parsed.data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
