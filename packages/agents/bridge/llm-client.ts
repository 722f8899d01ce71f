// LLM client — Anthropic Messages API behind a minimal completion interface
// SDK retries are off; the stage executor owns retry policy

import Anthropic from '@anthropic-ai/sdk';
import { TransientError, PermanentError } from '../orchestrator/errors.js';
import { errorMessage } from '../utils/logger.js';

export interface LlmRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LlmClient {
  readonly model: string;
  complete(request: LlmRequest, signal?: AbortSignal): Promise<string>;
}

export interface LlmClientConfig {
  apiKey?: string;
  model: string;
  temperature?: number;
  /** Per-request timeout inside the SDK (default: 60s) */
  timeoutMs?: number;
}

const TRANSIENT_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

/** Translate SDK failures into the retry taxonomy */
export function classifyLlmError(err: unknown): TransientError | PermanentError {
  if (err instanceof Anthropic.APIConnectionError) {
    return new TransientError(`LLM connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
      return new TransientError(`LLM request failed (${status}): ${err.message}`, { cause: err });
    }
    return new PermanentError(`LLM request failed${status !== undefined ? ` (${status})` : ''}: ${err.message}`, { cause: err });
  }
  const message = errorMessage(err);
  return new PermanentError(`LLM request failed: ${message}`, { cause: err });
}

/**
 * Create an Anthropic-backed client.
 * Returns null if no API key is configured.
 */
export function createLlmClient(config: LlmClientConfig): LlmClient | null {
  if (!config.apiKey) return null;

  const client = new Anthropic({
    apiKey: config.apiKey,
    maxRetries: 0,
    timeout: config.timeoutMs ?? 60_000,
  });

  return {
    model: config.model,
    async complete(request, signal) {
      let response: Anthropic.Message;
      try {
        response = await client.messages.create(
          {
            model: config.model,
            max_tokens: request.maxTokens ?? 1024,
            temperature: request.temperature ?? config.temperature ?? 0.3,
            system: request.system,
            messages: [{ role: 'user', content: request.prompt }],
          },
          { signal },
        );
      } catch (err) {
        throw classifyLlmError(err);
      }

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) {
        throw new TransientError('LLM returned an empty response');
      }
      return text;
    },
  };
}
