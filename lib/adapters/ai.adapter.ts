import { ModelUnavailableError } from '../errors';
import { TimeoutError, withTimeout } from '../timeout';
import type { ChatMessage } from '../types';

export interface InvokeOptions {
  /** Ask the provider for a JSON object response. */
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
  requestId?: string;
}

export interface AIResponse {
  content: string;
}

// AI Adapter Interface
export interface AIAdapter {
  invoke(messages: ChatMessage[], options?: InvokeOptions): Promise<AIResponse>;
}

/**
 * Bound every call of `adapter` by `timeoutMs`. A timeout surfaces as
 * {@link ModelUnavailableError} like any other provider failure.
 */
export function withInvokeTimeout(adapter: AIAdapter, timeoutMs: number): AIAdapter {
  return {
    async invoke(messages, options) {
      try {
        return await withTimeout(
          adapter.invoke(messages, options),
          timeoutMs,
          `Model call timed out after ${timeoutMs}ms`,
        );
      } catch (error) {
        if (error instanceof ModelUnavailableError) {
          throw error;
        }
        const message = error instanceof TimeoutError ? error.message : 'Model call failed';
        throw new ModelUnavailableError(message, { cause: error });
      }
    },
  };
}
