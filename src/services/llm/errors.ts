/**
 * Errors raised at the text-understanding call boundary.
 *
 * @module services/llm/errors
 */

export type LLMErrorCategory = 'LLM_API_ERROR' | 'LLM_TIMEOUT';

export class LLMRequestError extends Error {
  readonly category: LLMErrorCategory;
  /** HTTP status when the endpoint answered, otherwise undefined */
  readonly status?: number;
  /** Transient failure worth another attempt (and counted by the breaker) */
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { category?: LLMErrorCategory; status?: number; retryable: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'LLMRequestError';
    this.category = options.category ?? 'LLM_API_ERROR';
    this.status = options.status;
    this.retryable = options.retryable;
  }
}
