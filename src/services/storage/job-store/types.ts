/**
 * Type definitions for the job store
 *
 * Row types mirror the tables in migrations/schema-definitions.ts.
 */

import type { DomainSelection, GapSummary, LoopState } from '../../../models/protocol.js';

export enum JobStoreErrorCode {
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_ALREADY_EXISTS = 'JOB_ALREADY_EXISTS',
  STORAGE_ERROR = 'STORAGE_ERROR',
  CORRUPT_ARTIFACT = 'CORRUPT_ARTIFACT',
  INVALID_PAGES = 'INVALID_PAGES',
}

export class JobStoreError extends Error {
  readonly code: JobStoreErrorCode;

  constructor(message: string, code: JobStoreErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = 'JobStoreError';
    this.code = code;
  }
}

export interface JobRow {
  id: string;
  title: string;
  domain: string;
  page_count: number;
  created_at: string;
}

export interface PageRow {
  page_index: number;
  text: string;
}

export interface SeedPageRow {
  page_index: number;
  score: number;
  labels_json: string;
  modalities_json: string;
  snippets_json: string;
}

export interface CandidateRow {
  seq: number;
  field: string;
  page: number;
  raw_span: string;
  value_json: string;
  units: string;
  evidence: string;
  confidence: number;
  notes: string;
}

export interface ArtifactRow {
  body_json: string;
  updated_at: string;
}

export interface JobStatusRow {
  body_json: string;
}

export interface StatusTransitionRow {
  id: number;
  job_id: string;
  state: string;
  step: string;
  update_json: string;
  created_at: string;
}

export type ArtifactKind = 'winners' | 'gap_report' | 'doc_flags';

export interface CreateJobInput {
  id?: string;
  title?: string;
  domain?: DomainSelection;
  pages: ReadonlyArray<{ index: number; text: string }>;
  seedPages?: readonly number[];
}

export interface JobSummary {
  id: string;
  title: string;
  domain: DomainSelection;
  page_count: number;
  created_at: string;
  state: LoopState | null;
  step: string | null;
  stop_reason: string | null;
  gaps: GapSummary | null;
}

export interface ListJobsOptions {
  limit?: number;
  offset?: number;
}
