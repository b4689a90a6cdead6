import Anthropic from '@anthropic-ai/sdk';

import type { AssistantClient, AssistantRequest } from './assistant-client.js';

export interface AnthropicAssistantOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export class AnthropicAssistant implements AssistantClient {
  readonly model: string;
  private readonly maxTokens: number;
  private readonly client: Anthropic;

  constructor(options: AnthropicAssistantOptions) {
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    // The SDK retries transient failures by default; every call here is attempted once.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async complete(request: AssistantRequest): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: request.system,
      messages: request.messages.map((turn) => ({ role: turn.role, content: turn.content })),
    });

    return response.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
  }
}
