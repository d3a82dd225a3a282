/**
 * Text-Understanding Client (Ollama /api/chat)
 *
 * The single boundary to the probabilistic capability:
 * propose(system, user) -> raw response text. Each call is bounded by a
 * timeout, retried with exponential backoff on transient failures and
 * guarded by a circuit breaker. The instance owns its breaker; nothing here
 * is process-global.
 *
 * Start Ollama and pull a model before use:
 *   ollama serve
 *   ollama pull llama3.1
 */

import { z } from 'zod';

import { withRetry } from '../../utils/backoff.js';
import { CircuitBreaker, type CircuitBreakerStatus } from './circuit-breaker.js';
import { LLMConfigSchema, type LLMConfig, type LLMConfigInput } from './config.js';
import { LLMRequestError } from './errors.js';

/**
 * Anything that can answer a system + user instruction pair with text.
 * Tests substitute a vi.fn() implementation.
 */
export interface ProposalClient {
  propose(systemInstructions: string, userInstructions: string): Promise<string>;
}

/** Fields of the /api/chat reply the client relies on */
const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export class LLMClient implements ProposalClient {
  private readonly config: LLMConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(config: LLMConfigInput = {}) {
    this.config = LLMConfigSchema.parse(config);
    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: this.config.circuitBreaker.failureThreshold,
      recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
    });
  }

  get model(): string {
    return this.config.model;
  }

  getCircuitStatus(): CircuitBreakerStatus {
    return this.circuitBreaker.getStatus();
  }

  /**
   * Send one JSON-mode chat request. Throws LLMRequestError (or
   * CircuitBreakerOpenError) once every attempt has failed.
   */
  async propose(systemInstructions: string, userInstructions: string): Promise<string> {
    const startTime = Date.now();

    const text = await this.circuitBreaker.execute(() =>
      withRetry(
        () => this.callChat(systemInstructions, userInstructions),
        (error) => error instanceof LLMRequestError && error.retryable,
        {
          maxAttempts: this.config.maxRetries + 1,
          baseDelayMs: this.config.backoffBaseMs,
          maxDelayMs: this.config.backoffMaxMs,
        },
        'LLMClient'
      )
    );

    console.error(
      `[LLMClient] ${this.config.model} answered ${text.length} chars in ${Date.now() - startTime}ms`
    );
    return text;
  }

  private async callChat(system: string, user: string): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
          format: 'json',
          stream: false,
          options: { temperature: this.config.temperature },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMRequestError(`Request timed out after ${this.config.timeoutMs}ms`, {
          category: 'LLM_TIMEOUT',
          retryable: true,
          cause: error,
        });
      }
      throw new LLMRequestError(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: true, cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      const status = rawResponse.status;
      throw new LLMRequestError(
        `Endpoint error ${status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        { status, retryable: status === 429 || status >= 500 }
      );
    }

    const payload: unknown = await rawResponse.json().catch((error: unknown) => {
      throw new LLMRequestError(
        `Endpoint returned a non-JSON envelope: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: false, cause: error }
      );
    });
    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LLMRequestError(
        `Unexpected chat envelope: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
        { retryable: false }
      );
    }
    return parsed.data.message.content;
  }
}
