import { generateText } from 'ai';

import { getLLMClient } from '../llm.js';

import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  Conversation,
} from '../types.js';
import type { CoreMessage } from 'ai';

type LLMProvider = ReturnType<typeof getLLMClient>;

function toCoreMessages(messages: Conversation): CoreMessage[] {
  return messages.map((message): CoreMessage =>
    message.role === 'system'
      ? { role: 'system', content: message.content }
      : { role: 'user', content: message.content }
  );
}

function tokenCount(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * Hosted chat models behind the AI Gateway.
 * The chat completions endpoint draws one candidate per call, so a batch of `n`
 * is issued as `n` concurrent completions whose usage is summed.
 */
export class GatewayCompletionClient implements CompletionClient {
  private readonly provider: LLMProvider;

  constructor(provider: LLMProvider = getLLMClient()) {
    this.provider = provider;
  }

  async generate(request: CompletionRequest): Promise<CompletionResponse> {
    // Use .chat() explicitly to force chat completions API (not responses API)
    const model = this.provider.chat(request.model);
    const messages = toCoreMessages(request.messages);

    const results = await Promise.all(
      Array.from({ length: request.n }, () =>
        generateText({
          model,
          messages,
          maxTokens: request.maxTokens,
          temperature: request.temperature,
        })
      )
    );

    return {
      choices: results.map((result) => ({ content: result.text })),
      usage: {
        promptTokens: results.reduce((sum, result) => sum + tokenCount(result.usage.promptTokens), 0),
        completionTokens: results.reduce(
          (sum, result) => sum + tokenCount(result.usage.completionTokens),
          0
        ),
      },
    };
  }
}
