/**
 * Server Configuration
 *
 * One ProtocolConfig value is built per process from the environment and
 * handed to every component that needs it.
 *
 * @module server/config
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

import { LLMConfigSchema, type LLMConfigInput } from '../services/llm/config.js';
import { DEFAULT_WINDOW_SPAN } from '../services/protocol/extraction.js';
import { DEFAULT_PER_FIELD_LIMIT } from '../services/protocol/normalization.js';
import { DEFAULT_TOP_K } from '../services/triage/preflight.js';
import { configurationError } from './errors.js';

export const DEFAULT_DATABASE_PATH = join(homedir(), '.protocol-extractor', 'jobs.db');

export const ProtocolConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  loop: z
    .object({
      maxSteps: z.number().int().min(1).default(7),
      maxSpan: z.number().int().min(0).max(10).default(4),
      initialSpan: z.number().int().min(0).default(2),
      preflight: z.boolean().default(true),
      topK: z.number().int().min(1).default(DEFAULT_TOP_K),
    })
    .default({}),
  extraction: z
    .object({
      windowSpan: z.number().int().min(0).max(10).default(DEFAULT_WINDOW_SPAN),
      perFieldLimit: z.number().int().min(1).max(20).default(DEFAULT_PER_FIELD_LIMIT),
    })
    .default({}),
  domain: z.enum(['ct', 'mri', 'auto']).default('auto'),
  storage: z
    .object({
      databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
    })
    .default({}),
});

export type ProtocolConfig = z.infer<typeof ProtocolConfigSchema>;

export interface ProtocolConfigOverrides {
  llm?: LLMConfigInput;
  loop?: Partial<ProtocolConfig['loop']>;
  extraction?: Partial<ProtocolConfig['extraction']>;
  domain?: ProtocolConfig['domain'];
  storage?: Partial<ProtocolConfig['storage']>;
}

type Env = Record<string, string | undefined>;

function numberEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw configurationError(`${name} must be a number, got "${raw}"`, { variable: name, value: raw });
  }
  return parsed;
}

function booleanEnv(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw configurationError(`${name} must be a boolean, got "${raw}"`, { variable: name, value: raw });
}

function stringEnv(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build the configuration from `env` (process.env by default) with
 * `overrides` taking precedence. MAX_SPAN is clamped to 0..10 rather than
 * rejected.
 *
 * @throws ProtocolError CONFIGURATION_ERROR on unparseable or out-of-range values
 */
export function loadProtocolConfig(overrides: ProtocolConfigOverrides = {}, env: Env = process.env): ProtocolConfig {
  const maxSpan = numberEnv(env, 'MAX_SPAN');

  const fromEnv = {
    llm: {
      baseUrl: stringEnv(env, 'LLM_BASE_URL'),
      model: stringEnv(env, 'LLM_MODEL'),
      temperature: numberEnv(env, 'LLM_TEMPERATURE'),
      timeoutMs: numberEnv(env, 'LLM_TIMEOUT_MS'),
      maxRetries: numberEnv(env, 'LLM_MAX_RETRIES'),
      backoffBaseMs: numberEnv(env, 'LLM_RETRY_BACKOFF_MS'),
      circuitBreaker: {
        failureThreshold: numberEnv(env, 'LLM_CIRCUIT_FAILURES'),
        recoveryTimeMs: numberEnv(env, 'LLM_CIRCUIT_RECOVERY_MS'),
      },
    },
    loop: {
      maxSteps: numberEnv(env, 'MAX_AGENT_STEPS'),
      maxSpan: maxSpan === undefined ? undefined : Math.max(0, Math.min(10, Math.trunc(maxSpan))),
      initialSpan: numberEnv(env, 'INITIAL_SPAN'),
      preflight: booleanEnv(env, 'PREFLIGHT_ENABLED'),
      topK: numberEnv(env, 'TRIAGE_TOP_K'),
    },
    extraction: {
      windowSpan: numberEnv(env, 'EXTRACTION_WINDOW_SPAN'),
      perFieldLimit: numberEnv(env, 'PER_FIELD_LIMIT'),
    },
    domain: stringEnv(env, 'PROTOCOL_DOMAIN')?.toLowerCase(),
    storage: {
      databasePath: stringEnv(env, 'PROTOCOL_DB_PATH'),
    },
  };

  const merged = {
    llm: {
      ...fromEnv.llm,
      ...overrides.llm,
      circuitBreaker: { ...fromEnv.llm.circuitBreaker, ...overrides.llm?.circuitBreaker },
    },
    loop: { ...fromEnv.loop, ...overrides.loop },
    extraction: { ...fromEnv.extraction, ...overrides.extraction },
    domain: overrides.domain ?? fromEnv.domain,
    storage: { ...fromEnv.storage, ...overrides.storage },
  };

  const result = ProtocolConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
