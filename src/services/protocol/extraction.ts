/**
 * Candidate Extraction
 *
 * One capability call per seed page window. A window that fails (transport
 * error, timeout, malformed output) contributes zero candidates and the
 * remaining windows still run; a pass is never aborted from here.
 *
 * @module services/protocol/extraction
 */

import { z } from 'zod';

import type { Candidate, CandidateValue, Page } from '../../models/protocol.js';
import type { ProposalClient } from '../llm/client.js';
import { proposeStructured } from '../llm/structured.js';
import type { DomainProfile } from './domains.js';
import { extractionSystemPrompt, extractionUserPrompt } from './prompts.js';
import { buildWindow, type TextWindow } from './windowing.js';

export const MAX_EVIDENCE_CHARS = 200;
export const DEFAULT_WINDOW_SPAN = 1;

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Accepts {"candidates": [...]} or a bare array */
const ExtractionEnvelopeSchema = z.union([
  z.object({ candidates: z.array(z.unknown()).nullish() }).transform((o) => o.candidates ?? []),
  z.array(z.unknown()),
]);

const CandidateItemSchema = z.object({
  field: z.string().trim().min(1),
  page: z.unknown().optional(),
  raw_span: z.string().trim().min(1),
  value: z.union([z.number(), z.string(), z.array(z.union([z.number(), z.string()]))]),
  units: z.string().nullish(),
  evidence: z.string().trim().min(1),
  confidence: z.union([z.number(), z.string()]).nullish(),
  notes: z.unknown().optional(),
});

type CandidateItem = z.infer<typeof CandidateItemSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// SANITIZING
// ═══════════════════════════════════════════════════════════════════════════════

function clampConfidence(raw: CandidateItem['confidence']): number {
  const n = typeof raw === 'number' ? raw : Number(raw ?? 0);
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

function resolvePage(raw: unknown, center: number): number {
  const n = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() ? Number(raw) : NaN;
  return Number.isInteger(n) ? n : center;
}

/**
 * Validate one proposed item. Items without a non-empty field, raw_span or
 * evidence (or without a value) are discarded.
 */
export function sanitizeCandidate(raw: unknown, center: number): Candidate | null {
  const parsed = CandidateItemSchema.safeParse(raw);
  if (!parsed.success) return null;
  const item = parsed.data;

  const value: CandidateValue = typeof item.value === 'string' ? item.value.trim() : item.value;
  return {
    field: item.field,
    page: resolvePage(item.page, center),
    raw_span: item.raw_span,
    value,
    units: (item.units ?? '').trim(),
    evidence: item.evidence.slice(0, MAX_EVIDENCE_CHARS),
    confidence: clampConfidence(item.confidence),
    notes: typeof item.notes === 'string' ? item.notes : '',
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the capability over one window. Never throws.
 */
export async function extractFromWindow(
  client: ProposalClient,
  profile: DomainProfile,
  window: TextWindow,
  label: string
): Promise<Candidate[]> {
  if (!window.text.trim()) return [];

  const outcome = await proposeStructured(
    client,
    extractionSystemPrompt(profile),
    extractionUserPrompt(profile, window.text, window.center),
    ExtractionEnvelopeSchema,
    label
  );
  if (outcome.kind !== 'valid') {
    console.error(`[Extraction] ${label}: window contributes no candidates (${outcome.kind})`);
    return [];
  }

  const out: Candidate[] = [];
  let discarded = 0;
  for (const item of outcome.value) {
    const candidate = sanitizeCandidate(item, window.center);
    if (candidate) {
      out.push(candidate);
    } else {
      discarded++;
    }
  }
  if (discarded > 0) {
    console.error(`[Extraction] ${label}: discarded ${discarded} item(s) without field/raw_span/evidence`);
  }
  return out;
}

export interface ExtractionRunOptions {
  windowSpan?: number;
  /** Prefix for log lines, usually the job id */
  label?: string;
}

/**
 * Windows are processed one at a time, in the order the seed pages are given.
 */
export async function extractCandidates(
  client: ProposalClient,
  profile: DomainProfile,
  pages: readonly Page[],
  seedPages: readonly number[],
  options: ExtractionRunOptions = {}
): Promise<Candidate[]> {
  const windowSpan = options.windowSpan ?? DEFAULT_WINDOW_SPAN;
  const label = options.label ?? 'extract';
  const all: Candidate[] = [];

  for (const seed of seedPages) {
    const window = buildWindow(pages, seed, windowSpan);
    const found = await extractFromWindow(client, profile, window, `${label} page ${seed}`);
    all.push(...found);
  }

  console.error(
    `[Extraction] ${label}: ${all.length} candidate(s) from ${seedPages.length} window(s), span ${windowSpan}`
  );
  return all;
}
