/**
 * Circuit Breaker for the text-understanding endpoint
 *
 * Counts consecutive transient failures (HTTP 429/5xx, timeouts, network
 * errors). A 4xx or an unparseable envelope leaves the breaker alone. After
 * the recovery time one probe call is let through: success closes the
 * circuit, failure reopens it with twice the recovery time.
 */

import { LLMRequestError } from './errors.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /\b(429|500|502|503|504)\b/,
  /rate.?limit/i,
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed/i,
  /server.?(error|overloaded|unavailable)|service.?unavailable|model.*load/i,
];

function causeText(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause !== null && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return '';
}

/**
 * Whether an error is a transient, server-side failure.
 */
export function isServerError(error: unknown): boolean {
  if (error instanceof LLMRequestError) return error.retryable;
  if (!(error instanceof Error)) return false;

  const text = `${error.message} ${causeText(error.cause)}`;
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(text));
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

/** Recovery waits at most 16x the configured time */
const MAX_TRIP_EXPONENT = 4;

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private lastFailureAt: number | null = null;
  private trips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { failureThreshold: 5, recoveryTimeMs: 60000, ...config };
  }

  getRecoveryTimeMs(): number {
    const exponent = Math.min(Math.max(0, this.trips - 1), MAX_TRIP_EXPONENT);
    return this.config.recoveryTimeMs * 2 ** exponent;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.refresh();
    if (this.state === CircuitState.OPEN) {
      const wait = this.remaining();
      throw new CircuitBreakerOpenError(`Circuit breaker is OPEN. Try again in ${Math.ceil(wait / 1000)}s`, wait);
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (isServerError(error)) {
        this.onTransientFailure();
      } else {
        console.error(
          `[CircuitBreaker] Not counted: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }

    if (this.state === CircuitState.HALF_OPEN) {
      this.trips = 0;
      this.moveTo(CircuitState.CLOSED, 'probe succeeded');
    }
    this.failures = 0;
    this.lastFailureAt = null;
    return result;
  }

  private onTransientFailure(): void {
    this.failures++;
    this.lastFailureAt = Date.now();
    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.config.failureThreshold) {
      this.trips++;
      this.moveTo(
        CircuitState.OPEN,
        `${this.failures} failure(s), trip #${this.trips}, recovery ${this.getRecoveryTimeMs()}ms`
      );
    }
  }

  /** OPEN becomes HALF_OPEN once the recovery time has passed */
  private refresh(): void {
    if (this.state === CircuitState.OPEN && this.remaining() === 0) {
      this.moveTo(CircuitState.HALF_OPEN, 'recovery time elapsed');
    }
  }

  private moveTo(next: CircuitState, why: string): void {
    if (next !== this.state) {
      console.error(`[CircuitBreaker] ${this.state} -> ${next} (${why})`);
    }
    this.state = next;
  }

  private remaining(): number {
    if (this.lastFailureAt === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureAt));
  }

  isOpen(): boolean {
    this.refresh();
    return this.state === CircuitState.OPEN;
  }

  getStatus(): CircuitBreakerStatus {
    this.refresh();
    return {
      state: this.state,
      failureCount: this.failures,
      lastFailureTime: this.lastFailureAt,
      timeToRecovery: this.state === CircuitState.OPEN ? this.remaining() : null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.lastFailureAt = null;
    this.trips = 0;
  }
}

export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
