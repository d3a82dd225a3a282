/**
 * Text-Understanding Endpoint Configuration
 *
 * Any Ollama-compatible /api/chat endpoint. No API key required.
 */

import { z } from 'zod';

export const DEFAULT_LLM_MODEL = 'llama3.1:latest';

export const LLMConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default(DEFAULT_LLM_MODEL),
  temperature: z.number().min(0).max(2).default(0),
  timeoutMs: z.number().int().positive().default(60_000),

  // Retries after the first attempt; 2 means 3 calls at most
  maxRetries: z.number().int().min(0).max(10).default(2),
  backoffBaseMs: z.number().int().min(0).default(500),
  backoffMaxMs: z.number().int().min(0).default(10_000),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().int().positive().default(60_000),
    })
    .default({}),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type LLMConfigInput = z.input<typeof LLMConfigSchema>;
