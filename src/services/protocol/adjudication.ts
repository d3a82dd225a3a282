/**
 * Adjudication
 *
 * Asks the capability to pick at most one representative per field, then
 * enforces the acceptance policy on its answer. The result is always a
 * well-formed WinnerSet: no representatives, a capability failure or a
 * malformed answer all produce an empty `fields` map.
 *
 * @module services/protocol/adjudication
 */

import { z } from 'zod';

import type { GroupedRepresentatives, Representative, Winner, WinnerSet } from '../../models/protocol.js';
import type { ProposalClient } from '../llm/client.js';
import { proposeStructured } from '../llm/structured.js';
import type { DomainProfile, FieldSpec } from './domains.js';
import { groupKey, normalize } from './normalization.js';
import { adjudicationSystemPrompt, adjudicationUserPrompt } from './prompts.js';

export const MAX_REASON_CHARS = 120;
export const MAX_WINNER_EVIDENCE_CHARS = 200;

/** Unwraps {"fields": {...}} to the per-field entries */
const AdjudicationEnvelopeSchema = z
  .object({ fields: z.record(z.unknown()).nullish() })
  .transform((o): Record<string, unknown> => o.fields ?? {});

const WinnerEntrySchema = z.object({
  value: z.unknown(),
  units: z.string().nullish(),
  page: z.union([z.number(), z.string()]).nullish(),
  evidence: z.string().nullish(),
  confidence: z.union([z.number(), z.string()]).nullish(),
  reason: z.string().nullish(),
});

type WinnerEntry = z.infer<typeof WinnerEntrySchema>;

export function emptyWinnerSet(profile: DomainProfile): WinnerSet {
  return { schema_version: 1, domain: profile.id, fields: {} };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ACCEPTANCE POLICY
// ═══════════════════════════════════════════════════════════════════════════════

export type RejectionReason =
  | 'unknown_field'
  | 'malformed_entry'
  | 'coercion_failed'
  | 'not_a_candidate'
  | 'below_acceptance'
  | 'hedged_evidence'
  | 'domain_rule';

export type EntryVerdict = { accepted: true; winner: Winner } | { accepted: false; reason: RejectionReason };

function toNumber(raw: number | string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const n = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(n) ? n : null;
}

/**
 * Apply type coercion and the acceptance policy to one adjudicated entry.
 * The value must map (by group key) onto one of the offered representatives.
 */
export function acceptEntry(
  profile: DomainProfile,
  spec: FieldSpec,
  rawEntry: unknown,
  representatives: readonly Representative[]
): EntryVerdict {
  const parsed = WinnerEntrySchema.safeParse(rawEntry);
  if (!parsed.success) return { accepted: false, reason: 'malformed_entry' };
  const entry: WinnerEntry = parsed.data;

  const normalized = normalize(spec, entry.value, entry.units ?? spec.unit);
  if (normalized === null) return { accepted: false, reason: 'coercion_failed' };

  const key = groupKey(spec, normalized);
  const match = representatives.find((r) => groupKey(spec, r.normalized_value) === key);
  if (!match) return { accepted: false, reason: 'not_a_candidate' };

  const confidence = Math.min(1, Math.max(0, toNumber(entry.confidence) ?? match.confidence));
  if (confidence < profile.thresholds.acceptance) {
    return { accepted: false, reason: 'below_acceptance' };
  }

  const evidence = (entry.evidence ?? '').trim() || match.evidence;
  if (profile.hedging.test(evidence)) {
    return { accepted: false, reason: 'hedged_evidence' };
  }
  if (spec.rejectEvidence?.test(evidence) && !spec.rejectUnless?.test(evidence)) {
    return { accepted: false, reason: 'domain_rule' };
  }

  const page = toNumber(entry.page);
  return {
    accepted: true,
    winner: {
      field: spec.name,
      value: match.normalized_value,
      units: spec.unit,
      page: page !== null && Number.isInteger(page) ? page : match.page,
      evidence: evidence.slice(0, MAX_WINNER_EVIDENCE_CHARS),
      confidence,
      reason: (entry.reason ?? '').trim().slice(0, MAX_REASON_CHARS),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ADJUDICATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface AdjudicationOptions {
  modality?: string[];
  label?: string;
}

export async function adjudicate(
  client: ProposalClient,
  profile: DomainProfile,
  grouped: GroupedRepresentatives,
  options: AdjudicationOptions = {}
): Promise<WinnerSet> {
  const label = options.label ?? 'adjudicate';
  const result = emptyWinnerSet(profile);

  const offered = Object.values(grouped).reduce((n, reps) => n + reps.length, 0);
  if (offered === 0) {
    console.error(`[Adjudication] ${label}: no representatives, writing empty winner set`);
    return result;
  }

  const outcome = await proposeStructured(
    client,
    adjudicationSystemPrompt(profile),
    adjudicationUserPrompt(profile, grouped, options.modality ?? []),
    AdjudicationEnvelopeSchema,
    label
  );
  if (outcome.kind !== 'valid') {
    console.error(`[Adjudication] ${label}: ${outcome.kind}, writing empty winner set`);
    return result;
  }

  const dropped: string[] = [];
  for (const spec of profile.fields) {
    if (!(spec.name in outcome.value)) continue;
    const reps = grouped[spec.name] ?? [];
    const verdict = acceptEntry(profile, spec, outcome.value[spec.name], reps);
    if (verdict.accepted) {
      result.fields[spec.name] = verdict.winner;
    } else {
      dropped.push(`${spec.name}:${verdict.reason}`);
    }
  }

  const unknown = Object.keys(outcome.value).filter((k) => !profile.fields.some((f) => f.name === k));
  for (const name of unknown) dropped.push(`${name}:unknown_field`);

  if (dropped.length > 0) {
    console.error(`[Adjudication] ${label}: dropped ${dropped.join(', ')}`);
  }
  return result;
}
