// Anthropic Messages API backend for the LLM gateway

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionRequest, LlmBackend } from '../llm/gateway.js';

export interface AnthropicBackendOptions {
  apiKey: string;
  /** Injected client, mainly for tests */
  client?: Anthropic;
}

export class AnthropicBackend implements LlmBackend {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(options: AnthropicBackendOptions) {
    // Retries belong to the gateway, which also switches models between attempts
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal },
    );

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}
