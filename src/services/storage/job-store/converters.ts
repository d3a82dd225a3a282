/**
 * Row -> model converters for the job store
 *
 * Stored JSON was written by this module, so it is trusted once it parses;
 * a parse failure is corruption and fails fast.
 */

import {
  LOOP_STATES,
  type Candidate,
  type CandidateValue,
  type DomainSelection,
  type Job,
  type LoopState,
  type SeedPage,
} from '../../../models/protocol.js';
import {
  JobStoreError,
  JobStoreErrorCode,
  type CandidateRow,
  type JobRow,
  type SeedPageRow,
} from './types.js';

const DOMAIN_SELECTIONS: readonly string[] = ['ct', 'mri', 'auto'];

export function parseStoredJson<T>(raw: string, context: string): T {
  try {
    return JSON.parse(raw) as T;
  } catch (error) {
    throw new JobStoreError(
      `Corrupt JSON in ${context}: ${error instanceof Error ? error.message : String(error)}`,
      JobStoreErrorCode.CORRUPT_ARTIFACT,
      error
    );
  }
}

export function isDomainSelection(value: string): value is DomainSelection {
  return DOMAIN_SELECTIONS.includes(value);
}

export function isLoopState(value: string): value is LoopState {
  return LOOP_STATES.some((s) => s === value);
}

export function rowToJob(row: JobRow): Job {
  if (!isDomainSelection(row.domain)) {
    throw new JobStoreError(
      `Invalid domain "${row.domain}" in job ${row.id}`,
      JobStoreErrorCode.CORRUPT_ARTIFACT
    );
  }
  return {
    id: row.id,
    title: row.title,
    domain: row.domain,
    page_count: row.page_count,
    created_at: row.created_at,
  };
}

export function rowToSeedPage(row: SeedPageRow, jobId: string): SeedPage {
  return {
    page: row.page_index,
    score: row.score,
    labels: parseStoredJson<string[]>(row.labels_json, `seed_pages(${jobId}).labels`),
    modalities: parseStoredJson<string[]>(row.modalities_json, `seed_pages(${jobId}).modalities`),
    snippets: parseStoredJson<string[]>(row.snippets_json, `seed_pages(${jobId}).snippets`),
  };
}

export function rowToCandidate(row: CandidateRow, jobId: string): Candidate {
  return {
    field: row.field,
    page: row.page,
    raw_span: row.raw_span,
    value: parseStoredJson<CandidateValue>(row.value_json, `candidates(${jobId}#${row.seq}).value`),
    units: row.units,
    evidence: row.evidence,
    confidence: row.confidence,
    notes: row.notes,
  };
}
