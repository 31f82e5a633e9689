import OpenAI from 'openai';
import type { AIAdapter, AIResponse, InvokeOptions } from './ai.adapter';
import type { AIConfig } from '../config';
import { ModelUnavailableError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { ChatMessage } from '../types';

type CompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type Completion = OpenAI.Chat.Completions.ChatCompletion;

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.status === 429) {
    return true;
  }
  const message = errorMessage(error).toLowerCase();
  return message.includes('rate limit') || message.includes('tokens per min');
}

export class OpenAIAdapter implements AIAdapter {
  private client: OpenAI;
  private model: string;
  private maxRetries: number;
  private logger?: Logger;

  constructor(config: AIConfig, logger?: Logger, client?: OpenAI) {
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      // Rate limits are retried below with our own backoff
      maxRetries: 0,
    });
    this.model = config.model;
    this.maxRetries = Math.max(1, config.maxRetries);
    this.logger = logger;
  }

  private async chatWithRetry(params: CompletionParams): Promise<Completion> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        return await this.client.chat.completions.create(params);
      } catch (error) {
        lastError = error;

        if (!isRateLimitError(error) || attempt === this.maxRetries - 1) {
          // Not a rate limit error, or we're out of retries
          throw error;
        }

        // Exponential backoff: 2^attempt seconds (2s, 4s, 8s)
        const delaySeconds = Math.pow(2, attempt + 1);

        await this.logger?.info('OpenAI rate limit - retrying', {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delaySeconds,
          error: errorMessage(error),
        });

        await new Promise((resolve) => setTimeout(resolve, delaySeconds * 1000));
      }
    }

    throw lastError;
  }

  async invoke(messages: ChatMessage[], options: InvokeOptions = {}): Promise<AIResponse> {
    try {
      const params: CompletionParams = {
        model: this.model,
        messages,
        temperature: options.temperature ?? 0,
      };
      if (options.maxTokens !== undefined) {
        params.max_tokens = options.maxTokens;
      }
      if (options.json) {
        params.response_format = { type: 'json_object' };
      }

      const completion = await this.chatWithRetry(params);

      const choice = completion.choices[0];
      const completionDetails = {
        finishReason: choice?.finish_reason,
        responseLength: choice?.message?.content?.length,
        promptTokens: completion.usage?.prompt_tokens,
        completionTokens: completion.usage?.completion_tokens,
        totalTokens: completion.usage?.total_tokens,
      };

      if (options.requestId) {
        await this.logger?.debug(`OpenAI completion [${options.requestId}]`, completionDetails);
      }

      return { content: choice?.message?.content ?? '' };
    } catch (error) {
      await this.logger?.error('OpenAI API error', error);
      throw new ModelUnavailableError(`Failed to get AI response: ${errorMessage(error)}`, { cause: error });
    }
  }
}
