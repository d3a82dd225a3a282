/**
 * Structured Proposals
 *
 * Turns the capability's raw text into a tagged outcome. Nothing downstream
 * trusts a field before it has passed a zod schema here, and nothing here
 * throws: capability failures and malformed output are values.
 *
 * @module services/llm/structured
 */

import { z } from 'zod';

import type { ProposalClient } from './client.js';

export type StructuredOutcome<T> =
  | { kind: 'valid'; value: T }
  | { kind: 'malformed'; raw: string; issues: string[] }
  | { kind: 'capability_error'; error: string };

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

/**
 * Parse JSON from model output: strip code fences, try the whole text, then
 * the span from the first '{' to the last '}'.
 */
export function parseJsonBestEffort(text: string): JsonParseResult {
  if (!text || text.trim().length === 0) {
    return { ok: false, reason: 'empty response' };
  }

  const clean = text.replace(/```(?:json)?\s*\n?|\n?```/g, '').trim();

  let wholeTextError: string;
  try {
    return { ok: true, value: JSON.parse(clean) };
  } catch (error) {
    wholeTextError = error instanceof Error ? error.message : String(error);
  }

  const firstBrace = clean.indexOf('{');
  const lastBrace = clean.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    try {
      return { ok: true, value: JSON.parse(clean.slice(firstBrace, lastBrace + 1)) };
    } catch (error) {
      return {
        ok: false,
        reason: `unparseable JSON block: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  return { ok: false, reason: `no JSON object in ${clean.length} chars (${wholeTextError})` };
}

/**
 * Call the capability and validate its answer against `schema`.
 */
export async function proposeStructured<T>(
  client: ProposalClient,
  systemInstructions: string,
  userInstructions: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): Promise<StructuredOutcome<T>> {
  let raw: string;
  try {
    raw = await client.propose(systemInstructions, userInstructions);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Structured] ${label}: capability error: ${message}`);
    return { kind: 'capability_error', error: message };
  }

  const parsed = parseJsonBestEffort(raw);
  if (!parsed.ok) {
    console.error(`[Structured] ${label}: malformed output (${parsed.reason})`);
    return { kind: 'malformed', raw, issues: [parsed.reason] };
  }

  const result = schema.safeParse(parsed.value);
  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    console.error(`[Structured] ${label}: output failed validation: ${issues.join('; ')}`);
    return { kind: 'malformed', raw, issues };
  }

  return { kind: 'valid', value: result.data };
}
