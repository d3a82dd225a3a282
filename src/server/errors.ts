/**
 * MCP Server Error Handling
 *
 * Every tool failure is rendered as a ProtocolError with a category, message,
 * recovery hint and optional details. Absorbed capability failures never get
 * here; only validation, storage, configuration and loop-level errors do.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const ERROR_CATEGORIES = [
  'VALIDATION_ERROR',
  'JOB_NOT_FOUND',
  'JOB_ALREADY_EXISTS',
  'STORAGE_ERROR',
  'LLM_API_ERROR',
  'LLM_TIMEOUT',
  'LLM_CIRCUIT_OPEN',
  'CONFIGURATION_ERROR',
  'PATH_NOT_FOUND',
  'INTERNAL_ERROR',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

const VALID_CATEGORIES = new Set<string>(ERROR_CATEGORIES);

function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && VALID_CATEGORIES.has(value);
}

/**
 * Map custom error class names to categories. Errors that carry their own
 * `category` (LLMRequestError) or `code` (JobStoreError) override this.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  JobStoreError: 'STORAGE_ERROR',
  MigrationError: 'STORAGE_ERROR',
  SqliteError: 'STORAGE_ERROR',
  LLMRequestError: 'LLM_API_ERROR',
  CircuitBreakerOpenError: 'LLM_CIRCUIT_OPEN',
  ConfigurationError: 'CONFIGURATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

function readStringProp(value: object, key: string): string | undefined {
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
}

function readRecordProp(value: object, key: string): Record<string, unknown> | undefined {
  const prop: unknown = Reflect.get(value, key);
  if (prop === null || typeof prop !== 'object' || Array.isArray(prop)) return undefined;
  return Object.fromEntries(Object.entries(prop));
}

export class ProtocolError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ProtocolError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProtocolError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): ProtocolError {
    if (error instanceof ProtocolError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory = readStringProp(error, 'category');
      const code = readStringProp(error, 'code');
      let category: ErrorCategory = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      if (isErrorCategory(ownCategory)) {
        category = ownCategory;
      } else if (error.name === 'JobStoreError' && isErrorCategory(code)) {
        category = code;
      }

      const customDetails = readRecordProp(error, 'details');
      return new ProtocolError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new ProtocolError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next tool and a short hint, for agents that self-correct.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'protocol_job_list', hint: 'Check parameter types and required fields' },
  JOB_NOT_FOUND: { tool: 'protocol_job_list', hint: 'Use protocol_job_list to see available jobs' },
  JOB_ALREADY_EXISTS: { tool: 'protocol_job_list', hint: 'Choose a unique job id or omit it' },
  STORAGE_ERROR: {
    tool: 'protocol_status',
    hint: 'Check PROTOCOL_DB_PATH is writable and not locked by another process',
  },
  LLM_API_ERROR: { tool: 'protocol_status', hint: 'Check LLM_BASE_URL and that the model is pulled' },
  LLM_TIMEOUT: { tool: 'protocol_run', hint: 'Raise LLM_TIMEOUT_MS or retry with a smaller span' },
  LLM_CIRCUIT_OPEN: {
    tool: 'protocol_status',
    hint: 'The model endpoint failed repeatedly; wait for circuit recovery and retry',
  },
  CONFIGURATION_ERROR: {
    tool: 'protocol_status',
    hint: 'Check environment variables: LLM_*, MAX_AGENT_STEPS, MAX_SPAN, PROTOCOL_*',
  },
  PATH_NOT_FOUND: { tool: 'protocol_export', hint: 'Verify the target directory path exists' },
  INTERNAL_ERROR: { tool: 'protocol_status', hint: 'Inspect the job status record and stderr log' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
}

/**
 * Format ProtocolError for tool response
 */
export function formatErrorResponse(error: ProtocolError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): ProtocolError {
  return new ProtocolError('VALIDATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): ProtocolError {
  return new ProtocolError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}

export function configurationError(message: string, details?: Record<string, unknown>): ProtocolError {
  return new ProtocolError('CONFIGURATION_ERROR', message, details);
}
