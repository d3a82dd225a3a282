/**
 * Protocol Extraction Data Model
 *
 * Pages come from the external text-extraction step. Candidates are raw
 * per-field guesses produced by the text-understanding capability.
 * Representatives, winners and gap reports are derived each pass.
 *
 * @module models/protocol
 */

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT INPUTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One page of document text. Index is zero-based and unique within a job.
 */
export interface Page {
  index: number;
  text: string;
}

/**
 * Triage-selected page of likely relevance
 */
export interface SeedPage {
  page: number;
  score: number;
  labels: string[];
  modalities: string[];
  snippets: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

/** Value exactly as proposed by the capability */
export type CandidateValue = number | string | Array<number | string>;

/** Canonical per-field form: unit-converted scalar, vector/pair, or trimmed string */
export type NormalizedValue = number | string | number[];

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATES, REPRESENTATIVES, WINNERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Candidate {
  field: string;
  page: number;
  raw_span: string;
  value: CandidateValue;
  units: string;
  /** Literal supporting substring, at most 200 chars */
  evidence: string;
  /** In [0, 1] */
  confidence: number;
  notes: string;
}

/**
 * Highest-confidence candidate within one normalized-value cluster of a field
 */
export interface Representative {
  value: CandidateValue;
  normalized_value: NormalizedValue;
  page: number;
  confidence: number;
  evidence: string;
  units: string;
}

/** field -> representatives sorted by descending confidence (top-N) */
export type GroupedRepresentatives = Record<string, Representative[]>;

export interface Winner {
  field: string;
  value: NormalizedValue;
  units: string;
  page: number;
  evidence: string;
  confidence: number;
  reason: string;
}

export interface WinnerSet {
  schema_version: 1;
  domain: string;
  fields: Record<string, Winner>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GAP REPORT
// ═══════════════════════════════════════════════════════════════════════════════

export interface GapOption {
  value: NormalizedValue;
  page: number;
  confidence: number;
  evidence: string;
}

export interface AmbiguityEntry {
  field: string;
  options: GapOption[];
  reason: string;
}

export interface ConflictEntry {
  field: string;
  a: GapOption;
  b: GapOption;
  reason: string;
}

export interface ClarifyingQuestion {
  field: string;
  question: string;
  rationale: string;
  evidence_pages: number[];
}

export interface GapSummary {
  missing: number;
  missing_low_conf: number;
  ambiguous: number;
  conflicts: number;
  questions: number;
}

export type GapPolicy = 'rule_gap_v1' | 'rule_gap_v1_stub';

export interface GapReport {
  schema_version: 1;
  policy: GapPolicy;
  domain: string;
  modality: string[];
  summary: GapSummary;
  missing: string[];
  missing_low_conf: string[];
  ambiguous: AmbiguityEntry[];
  conflicts: ConflictEntry[];
  questions: ClarifyingQuestion[];
  provenance: {
    from_winners: boolean;
    from_candidates: boolean;
    winner_count: number;
    candidate_count: number;
    generated_at: string;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PREFLIGHT
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocFlags {
  schema_version: 1;
  is_imaging: boolean;
  modalities: string[];
  confidence: number;
  reasons: string[];
  counter_signals: string[];
  title: string;
  title_confidence: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// JOB STATUS
// ═══════════════════════════════════════════════════════════════════════════════

/** Control-loop states */
export const LOOP_STATES = [
  'start',
  'preflight',
  'baseline_extract',
  'retry_widen',
  'stopped',
  'error',
] as const;
export type LoopState = (typeof LOOP_STATES)[number];

export const STOP_REASONS = ['gaps_resolved', 'budget_exhausted', 'non_imaging', 'exception'] as const;
export type StopReason = (typeof STOP_REASONS)[number];

export interface JobStatus {
  schema_version: 1;
  job_id: string;
  state: LoopState;
  step: string;
  stop_reason?: StopReason;
  steps_used?: number;
  max_steps?: number;
  last_action?: string;
  gaps_before?: GapSummary;
  gaps_after?: GapSummary;
  span?: number;
  improved?: boolean;
  pages?: number[];
  summary?: string;
  error?: string;
  updated_at: string;
}

/** Keys a status update may set; unspecified keys keep their stored value */
export type JobStatusUpdate = Partial<Omit<JobStatus, 'schema_version' | 'job_id' | 'updated_at'>> & {
  state: LoopState;
  step: string;
};

export interface StatusTransition {
  id: number;
  job_id: string;
  state: LoopState;
  step: string;
  update: JobStatusUpdate;
  created_at: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// JOB
// ═══════════════════════════════════════════════════════════════════════════════

export type DomainSelection = 'ct' | 'mri' | 'auto';

export interface Job {
  id: string;
  title: string;
  domain: DomainSelection;
  page_count: number;
  created_at: string;
}

export function emptyGapSummary(): GapSummary {
  return { missing: 0, missing_low_conf: 0, ambiguous: 0, conflicts: 0, questions: 0 };
}
