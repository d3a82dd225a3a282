/**
 * JobStore: every persisted artifact of every job, in one SQLite file
 *
 * A job's candidate log, winner set, gap report and status are written by a
 * single control loop at a time; the store adds no locking of its own.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import type {
  Candidate,
  DocFlags,
  GapReport,
  Job,
  JobStatus,
  JobStatusUpdate,
  Page,
  SeedPage,
  StatusTransition,
  WinnerSet,
} from '../../../models/protocol.js';
import { migrateToLatest } from '../migrations/index.js';
import * as artifactOps from './artifact-operations.js';
import * as jobOps from './job-operations.js';
import * as statusOps from './status-operations.js';
import {
  JobStoreError,
  JobStoreErrorCode,
  type CreateJobInput,
  type JobSummary,
  type ListJobsOptions,
} from './types.js';

export const IN_MEMORY = ':memory:';

export class JobStore {
  private readonly db: Database.Database;
  private readonly path: string;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Open (creating if needed) the store at `path` and bring its schema up
   * to date.
   * @throws JobStoreError STORAGE_ERROR when the file cannot be opened
   */
  static open(path: string): JobStore {
    if (path !== IN_MEMORY) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }

    let db: Database.Database;
    try {
      db = new Database(path);
    } catch (error) {
      throw new JobStoreError(
        `Failed to open job store at ${path}: ${error instanceof Error ? error.message : String(error)}`,
        JobStoreErrorCode.STORAGE_ERROR,
        error
      );
    }

    try {
      migrateToLatest(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return new JobStore(db, path);
  }

  getPath(): string {
    return this.path;
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[JobStore] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==================== JOBS ====================

  createJob(input: CreateJobInput): Job {
    return jobOps.createJob(this.db, input);
  }

  getJob(jobId: string): Job | null {
    return jobOps.getJob(this.db, jobId);
  }

  requireJob(jobId: string): Job {
    return jobOps.requireJob(this.db, jobId);
  }

  setJobTitle(jobId: string, title: string): void {
    jobOps.setJobTitle(this.db, jobId, title);
  }

  listJobs(options?: ListJobsOptions): JobSummary[] {
    return jobOps.listJobs(this.db, options);
  }

  getPages(jobId: string): Page[] {
    return jobOps.getPages(this.db, jobId);
  }

  getSeedPages(jobId: string): SeedPage[] {
    return jobOps.getSeedPages(this.db, jobId);
  }

  replaceSeedPages(jobId: string, seeds: readonly SeedPage[]): void {
    jobOps.replaceSeedPages(this.db, jobId, seeds);
  }

  // ==================== ARTIFACTS ====================

  replaceCandidates(jobId: string, candidates: readonly Candidate[]): void {
    artifactOps.replaceCandidates(this.db, jobId, candidates);
  }

  getCandidates(jobId: string): Candidate[] {
    return artifactOps.getCandidates(this.db, jobId);
  }

  countCandidates(jobId: string): number {
    return artifactOps.countCandidates(this.db, jobId);
  }

  replacePassOutcome(jobId: string, winners: WinnerSet, gapReport: GapReport): void {
    artifactOps.replacePassOutcome(this.db, jobId, winners, gapReport);
  }

  getWinners(jobId: string): WinnerSet | null {
    return artifactOps.getArtifact(this.db, jobId, 'winners');
  }

  getGapReport(jobId: string): GapReport | null {
    return artifactOps.getArtifact(this.db, jobId, 'gap_report');
  }

  getDocFlags(jobId: string): DocFlags | null {
    return artifactOps.getArtifact(this.db, jobId, 'doc_flags');
  }

  putDocFlags(jobId: string, flags: DocFlags): void {
    artifactOps.putArtifact(this.db, jobId, 'doc_flags', flags);
  }

  // ==================== STATUS ====================

  getStatus(jobId: string): JobStatus | null {
    return statusOps.getStatus(this.db, jobId);
  }

  mergeStatus(jobId: string, update: JobStatusUpdate): JobStatus {
    return statusOps.mergeStatus(this.db, jobId, update);
  }

  listTransitions(jobId: string, limit?: number): StatusTransition[] {
    return statusOps.listTransitions(this.db, jobId, limit);
  }
}
