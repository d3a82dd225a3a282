/**
 * Unit tests for server error handling
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';

import {
  ERROR_CATEGORIES,
  ProtocolError,
  configurationError,
  formatErrorResponse,
  getRecoveryHint,
  pathNotFoundError,
  validationError,
} from '../../../src/server/errors.js';
import { CircuitBreakerOpenError } from '../../../src/services/llm/circuit-breaker.js';
import { LLMRequestError } from '../../../src/services/llm/errors.js';
import { JobStoreError, JobStoreErrorCode } from '../../../src/services/storage/job-store/index.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ProtocolError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ProtocolError', () => {
  it('should carry category, message and details', () => {
    const error = new ProtocolError('VALIDATION_ERROR', 'span must be an integer', { field: 'span' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ProtocolError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('span must be an integer');
    expect(error.details).toEqual({ field: 'span' });
  });

  it('should serialize to JSON', () => {
    const json = new ProtocolError('INTERNAL_ERROR', 'boom').toJSON();
    expect(json).toMatchObject({ name: 'ProtocolError', category: 'INTERNAL_ERROR', message: 'boom' });
  });

  describe('fromUnknown', () => {
    it('should return a ProtocolError unchanged', () => {
      const original = validationError('bad');
      expect(ProtocolError.fromUnknown(original)).toBe(original);
    });

    it('should take the category from a job store error code', () => {
      const error = ProtocolError.fromUnknown(
        new JobStoreError('Job not found: j1', JobStoreErrorCode.JOB_NOT_FOUND)
      );
      expect(error.category).toBe('JOB_NOT_FOUND');
      expect(error.message).toBe('Job not found: j1');
      expect(error.details).toMatchObject({ originalName: 'JobStoreError', errorCode: 'JOB_NOT_FOUND' });
    });

    it('should fall back to STORAGE_ERROR for other job store codes', () => {
      const error = ProtocolError.fromUnknown(
        new JobStoreError('Corrupt JSON in artifacts(j1).winners', JobStoreErrorCode.CORRUPT_ARTIFACT)
      );
      expect(error.category).toBe('STORAGE_ERROR');
    });

    it('should take the category carried by an LLMRequestError', () => {
      const timeout = new LLMRequestError('Request timed out after 20ms', { category: 'LLM_TIMEOUT', retryable: true });
      expect(ProtocolError.fromUnknown(timeout).category).toBe('LLM_TIMEOUT');

      const api = new LLMRequestError('Endpoint error 400', { status: 400, retryable: false });
      expect(ProtocolError.fromUnknown(api).category).toBe('LLM_API_ERROR');
    });

    it('should map known error names', () => {
      expect(ProtocolError.fromUnknown(new CircuitBreakerOpenError('open', 1000)).category).toBe('LLM_CIRCUIT_OPEN');
      expect(ProtocolError.fromUnknown(new ValidationError('job_id: Required')).category).toBe('VALIDATION_ERROR');
    });

    it('should default to INTERNAL_ERROR', () => {
      expect(ProtocolError.fromUnknown(new Error('unexpected')).category).toBe('INTERNAL_ERROR');

      const fromString = ProtocolError.fromUnknown('plain string');
      expect(fromString.category).toBe('INTERNAL_ERROR');
      expect(fromString.message).toBe('plain string');
      expect(fromString.details).toEqual({ originalValue: 'plain string' });
    });

    it('should honor a default category', () => {
      expect(ProtocolError.fromUnknown(new Error('x'), 'STORAGE_ERROR').category).toBe('STORAGE_ERROR');
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('should include the recovery hint for the category', () => {
    const response = formatErrorResponse(pathNotFoundError('/nowhere'));

    expect(response).toEqual({
      success: false,
      error: {
        category: 'PATH_NOT_FOUND',
        message: 'Path does not exist: /nowhere',
        recovery: { tool: 'protocol_export', hint: 'Verify the target directory path exists' },
        details: { path: '/nowhere' },
      },
    });
  });
});

describe('getRecoveryHint', () => {
  it('should have a hint for every category', () => {
    for (const category of ERROR_CATEGORIES) {
      const hint = getRecoveryHint(category);
      expect(hint.tool).toMatch(/^protocol_/);
      expect(hint.hint.length).toBeGreaterThan(0);
    }
  });
});

describe('factories', () => {
  it('should build configuration errors', () => {
    const error = configurationError('MAX_SPAN must be a number', { variable: 'MAX_SPAN' });
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.details).toEqual({ variable: 'MAX_SPAN' });
  });
});
