/**
 * Model Client for single-shot, non-streaming completions
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ModelConfig } from '@watchlist-eval/core';
import { createScopedLogger, type Logger } from '@watchlist-eval/logger';
import { JSON_PREFILL } from './constants.js';

export interface CompletionRequest {
  system: string;
  user: string;
  /** Constrain the reply body to a JSON object */
  jsonOnly?: boolean;
}

export interface CompletionResponse {
  id: string;
  text: string;
  stopReason: string | null;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Anything that can turn a system prompt and a user message into reply text.
 * The classifier depends on this rather than on the SDK client.
 */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export class ModelClient implements TextGenerator {
  private client: Anthropic;
  private config: ModelConfig;
  private logger: Logger;

  constructor(config: ModelConfig, logger: Logger = createScopedLogger('model-client')) {
    this.config = config;
    this.logger = logger;

    // One attempt per case; the SDK would otherwise retry on its own
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const messages: Anthropic.MessageParam[] = [{ role: 'user', content: request.user }];

    if (request.jsonOnly) {
      messages.push({ role: 'assistant', content: JSON_PREFILL });
    }

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: request.system,
      messages,
    };

    const response = await this.client.messages.create(params);

    const body = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');

    this.logger.debug('Completion received', {
      model: response.model,
      stopReason: response.stop_reason,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });

    return {
      id: response.id,
      text: request.jsonOnly ? `${JSON_PREFILL}${body}` : body,
      stopReason: response.stop_reason,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
