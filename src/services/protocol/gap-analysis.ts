/**
 * Gap Analysis
 *
 * Deterministic classification of every catalog field against the current
 * winners and grouped representatives. Thresholds and tolerances come from
 * the domain profile. The report is always well-formed; with no winners and
 * no candidates it is the stub report (every required field missing).
 *
 * @module services/protocol/gap-analysis
 */

import type {
  AmbiguityEntry,
  ClarifyingQuestion,
  ConflictEntry,
  GapOption,
  GapReport,
  GroupedRepresentatives,
  NormalizedValue,
  Representative,
  WinnerSet,
} from '../../models/protocol.js';
import type { DomainProfile, FieldSpec, GapThresholds } from './domains.js';
import { formatValue } from './normalization.js';
import {
  ambiguityQuestion,
  conflictQuestion,
  lowConfidenceQuestion,
  missingQuestion,
} from './prompts.js';

export const MAX_QUESTIONS = 3;

/** Float slack for threshold comparisons (0.74 - 0.64 must count as 0.10) */
const EPSILON = 1e-9;

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE COMPARISON
// ═══════════════════════════════════════════════════════════════════════════════

export function relativeDifference(a: number, b: number): number {
  const denom = Math.max(Math.abs(a), Math.abs(b));
  return denom === 0 ? 0 : Math.abs(a - b) / denom;
}

function asNumberList(value: NormalizedValue): number[] | null {
  if (typeof value === 'number') return [value];
  if (Array.isArray(value)) return value;
  return null;
}

/**
 * Whether two values of the field disagree beyond its conflict tolerance.
 * Integer, pair and category fields conflict on any difference.
 */
export function exceedsTolerance(spec: FieldSpec, a: NormalizedValue, b: NormalizedValue): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return String(a).trim().toLowerCase() !== String(b).trim().toLowerCase();
  }

  const xs = asNumberList(a);
  const ys = asNumberList(b);
  if (!xs || !ys || xs.length !== ys.length) return true;

  const tol = spec.conflict;
  if (!tol) {
    return xs.some((x, i) => x !== ys[i]);
  }

  if (tol.perAxis) {
    const rel = tol.relative ?? 0;
    return xs.some((x, i) => relativeDifference(x, ys[i]) > rel + EPSILON);
  }

  return xs.some((x, i) => {
    const y = ys[i];
    const absHit = tol.absolute !== undefined && Math.abs(x - y) >= tol.absolute - EPSILON;
    const relHit = tol.relative !== undefined && relativeDifference(x, y) >= tol.relative - EPSILON;
    return absHit || relHit;
  });
}

/**
 * Numeric values are close when every component is within the profile's
 * relative closeness bound. Strings are never close.
 */
export function valuesClose(thresholds: GapThresholds, a: NormalizedValue, b: NormalizedValue): boolean {
  const xs = asNumberList(a);
  const ys = asNumberList(b);
  if (!xs || !ys || xs.length !== ys.length) return false;
  return xs.every((x, i) => relativeDifference(x, ys[i]) <= thresholds.closeRelative + EPSILON);
}

function isCategorical(a: NormalizedValue, b: NormalizedValue): boolean {
  return typeof a === 'string' && typeof b === 'string';
}

function toOption(rep: Representative): GapOption {
  return {
    value: rep.normalized_value,
    page: rep.page,
    confidence: rep.confidence,
    evidence: rep.evidence,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PER-FIELD CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

export type PairClass =
  | { kind: 'ambiguous'; entry: AmbiguityEntry }
  | { kind: 'conflict'; entry: ConflictEntry }
  | { kind: 'none' };

/**
 * Classify one field's representatives: the top one against each runner-up
 * in order. The first pair that is ambiguous or conflicting decides.
 * Conflicts carry no confidence floor.
 */
export function classifyField(
  profile: DomainProfile,
  spec: FieldSpec,
  reps: readonly Representative[]
): PairClass {
  const t = profile.thresholds;
  if (reps.length < 2) return { kind: 'none' };
  const top = reps[0];

  for (const other of reps.slice(1)) {
    const a = top.normalized_value;
    const b = other.normalized_value;
    const delta = Math.abs(top.confidence - other.confidence);
    const bothHigh =
      top.confidence >= t.ambiguityFloor - EPSILON && other.confidence >= t.ambiguityFloor - EPSILON;

    if (bothHigh && delta <= t.ambiguityDelta + EPSILON && (isCategorical(a, b) || valuesClose(t, a, b))) {
      return {
        kind: 'ambiguous',
        entry: {
          field: spec.name,
          options: [toOption(top), toOption(other)],
          reason: isCategorical(a, b)
            ? `two distinct values with similar confidence (Δ=${delta.toFixed(2)})`
            : `close values with similar confidence (Δ=${delta.toFixed(2)})`,
        },
      };
    }

    if (exceedsTolerance(spec, a, b)) {
      return {
        kind: 'conflict',
        entry: {
          field: spec.name,
          a: toOption(top),
          b: toOption(other),
          reason: `${formatValue(a, spec.unit)} vs ${formatValue(b, spec.unit)} exceeds the ${spec.label} tolerance`,
        },
      };
    }
  }

  return { kind: 'none' };
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUESTIONS
// ═══════════════════════════════════════════════════════════════════════════════

interface QuestionSource {
  field: string;
  required: boolean;
  /** 0 missing, 1 conflict, 2 ambiguous, 3 low confidence */
  rank: number;
  question: ClarifyingQuestion;
}

/**
 * Up to MAX_QUESTIONS, at most one per field: required fields before
 * optional ones, then missing, conflict, ambiguous, low confidence, then
 * catalog order.
 */
function draftQuestions(profile: DomainProfile, sources: QuestionSource[]): ClarifyingQuestion[] {
  const order = new Map(profile.fields.map((f, i) => [f.name, i]));
  const sorted = [...sources].sort(
    (x, y) =>
      Number(y.required) - Number(x.required) ||
      x.rank - y.rank ||
      (order.get(x.field) ?? 0) - (order.get(y.field) ?? 0)
  );

  const seen = new Set<string>();
  const out: ClarifyingQuestion[] = [];
  for (const s of sorted) {
    if (seen.has(s.field)) continue;
    seen.add(s.field);
    out.push(s.question);
    if (out.length >= MAX_QUESTIONS) break;
  }
  return out;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYZE
// ═══════════════════════════════════════════════════════════════════════════════

export interface GapAnalysisOptions {
  modality?: string[];
  candidateCount?: number;
  now?: () => Date;
}

export function analyzeGaps(
  profile: DomainProfile,
  winners: WinnerSet,
  grouped: GroupedRepresentatives,
  options: GapAnalysisOptions = {}
): GapReport {
  const t = profile.thresholds;
  const candidateCount = options.candidateCount ?? 0;
  const winnerCount = Object.keys(winners.fields).length;
  const repCount = Object.values(grouped).reduce((n, reps) => n + reps.length, 0);

  const missing: string[] = [];
  const lowConf: string[] = [];
  const ambiguous: AmbiguityEntry[] = [];
  const conflicts: ConflictEntry[] = [];
  const sources: QuestionSource[] = [];

  for (const spec of profile.fields) {
    const winner = winners.fields[spec.name];
    const reps = grouped[spec.name] ?? [];
    const pages = [...new Set(reps.map((r) => r.page))].sort((a, b) => a - b);

    if (!winner) {
      if (spec.required) {
        missing.push(spec.name);
        sources.push({
          field: spec.name,
          required: true,
          rank: 0,
          question: {
            field: spec.name,
            question: missingQuestion(spec.label),
            rationale: reps.length > 0 ? 'no candidate passed adjudication' : 'not found in the text',
            evidence_pages: pages,
          },
        });
      }
    } else if (winner.confidence < t.lowConfidence - EPSILON) {
      lowConf.push(spec.name);
      sources.push({
        field: spec.name,
        required: spec.required,
        rank: 3,
        question: {
          field: spec.name,
          question: lowConfidenceQuestion(spec.label, formatValue(winner.value, spec.unit)),
          rationale: `adjudicated with confidence ${winner.confidence.toFixed(2)}`,
          evidence_pages: [winner.page],
        },
      });
    }

    const cls = classifyField(profile, spec, reps);
    if (cls.kind === 'ambiguous') {
      ambiguous.push(cls.entry);
      sources.push({
        field: spec.name,
        required: spec.required,
        rank: 2,
        question: {
          field: spec.name,
          question: ambiguityQuestion(
            spec.label,
            cls.entry.options.map((o) => formatValue(o.value, spec.unit))
          ),
          rationale: cls.entry.reason,
          evidence_pages: [...new Set(cls.entry.options.map((o) => o.page))].sort((a, b) => a - b),
        },
      });
    } else if (cls.kind === 'conflict') {
      conflicts.push(cls.entry);
      sources.push({
        field: spec.name,
        required: spec.required,
        rank: 1,
        question: {
          field: spec.name,
          question: conflictQuestion(
            spec.label,
            formatValue(cls.entry.a.value, spec.unit),
            formatValue(cls.entry.b.value, spec.unit)
          ),
          rationale: cls.entry.reason,
          evidence_pages: [...new Set([cls.entry.a.page, cls.entry.b.page])].sort((a, b) => a - b),
        },
      });
    }
  }

  const questions = draftQuestions(profile, sources);
  const isStub = winnerCount === 0 && candidateCount === 0 && repCount === 0;

  return {
    schema_version: 1,
    policy: isStub ? 'rule_gap_v1_stub' : 'rule_gap_v1',
    domain: profile.id,
    modality: options.modality ?? [],
    summary: {
      missing: missing.length,
      missing_low_conf: lowConf.length,
      ambiguous: ambiguous.length,
      conflicts: conflicts.length,
      questions: questions.length,
    },
    missing,
    missing_low_conf: lowConf,
    ambiguous,
    conflicts,
    questions,
    provenance: {
      from_winners: winnerCount > 0,
      from_candidates: candidateCount > 0 || repCount > 0,
      winner_count: winnerCount,
      candidate_count: candidateCount,
      generated_at: (options.now ?? (() => new Date()))().toISOString(),
    },
  };
}

/** Gaps that keep the control loop running */
export function openGapCount(report: GapReport): number {
  return report.summary.missing + report.summary.conflicts;
}
