/**
 * Job, page and seed-page operations
 *
 * @module job-store/job-operations
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import type { GapReport, Job, JobStatus, Page, SeedPage } from '../../../models/protocol.js';
import { isLoopState, parseStoredJson, rowToJob, rowToSeedPage } from './converters.js';
import {
  JobStoreError,
  JobStoreErrorCode,
  type CreateJobInput,
  type JobRow,
  type JobSummary,
  type ListJobsOptions,
  type PageRow,
  type SeedPageRow,
} from './types.js';

function validatePages(pages: CreateJobInput['pages']): void {
  if (pages.length === 0) {
    throw new JobStoreError('A job needs at least one page', JobStoreErrorCode.INVALID_PAGES);
  }
  const seen = new Set<number>();
  for (const p of pages) {
    if (!Number.isInteger(p.index) || p.index < 0) {
      throw new JobStoreError(`Invalid page index ${p.index}`, JobStoreErrorCode.INVALID_PAGES);
    }
    if (seen.has(p.index)) {
      throw new JobStoreError(`Duplicate page index ${p.index}`, JobStoreErrorCode.INVALID_PAGES);
    }
    seen.add(p.index);
  }
}

/**
 * Create a job with its pages (and optional seed pages) in one transaction.
 * @throws JobStoreError JOB_ALREADY_EXISTS, INVALID_PAGES
 */
export function createJob(db: Database.Database, input: CreateJobInput): Job {
  validatePages(input.pages);
  const job: Job = {
    id: input.id ?? uuidv4(),
    title: input.title ?? '',
    domain: input.domain ?? 'auto',
    page_count: input.pages.length,
    created_at: new Date().toISOString(),
  };

  const insertJob = db.prepare(
    'INSERT INTO jobs (id, title, domain, page_count, created_at) VALUES (?, ?, ?, ?, ?)'
  );
  const insertPage = db.prepare('INSERT INTO pages (job_id, page_index, text) VALUES (?, ?, ?)');

  try {
    db.transaction(() => {
      insertJob.run(job.id, job.title, job.domain, job.page_count, job.created_at);
      for (const page of input.pages) {
        insertPage.run(job.id, page.index, page.text);
      }
      if (input.seedPages && input.seedPages.length > 0) {
        writeSeedPages(
          db,
          job.id,
          input.seedPages.map((page) => ({ page, score: 0, labels: [], modalities: [], snippets: [] }))
        );
      }
    })();
  } catch (error) {
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed: jobs.id')) {
      throw new JobStoreError(`Job "${job.id}" already exists`, JobStoreErrorCode.JOB_ALREADY_EXISTS, error);
    }
    throw error;
  }

  console.error(`[JobStore] Created job ${job.id} (${job.page_count} pages, domain ${job.domain})`);
  return job;
}

export function getJob(db: Database.Database, jobId: string): Job | null {
  const row = db
    .prepare<[string], JobRow>('SELECT id, title, domain, page_count, created_at FROM jobs WHERE id = ?')
    .get(jobId);
  return row ? rowToJob(row) : null;
}

/**
 * @throws JobStoreError JOB_NOT_FOUND
 */
export function requireJob(db: Database.Database, jobId: string): Job {
  const job = getJob(db, jobId);
  if (!job) {
    throw new JobStoreError(`Job not found: ${jobId}`, JobStoreErrorCode.JOB_NOT_FOUND);
  }
  return job;
}

export function setJobTitle(db: Database.Database, jobId: string, title: string): void {
  db.prepare('UPDATE jobs SET title = ? WHERE id = ?').run(title, jobId);
}

/**
 * Newest first, each with its latest status and gap summary.
 */
export function listJobs(db: Database.Database, options: ListJobsOptions = {}): JobSummary[] {
  const rows = db
    .prepare<
      [number, number],
      JobRow & { status_json: string | null; gaps_json: string | null }
    >(
      `SELECT j.id, j.title, j.domain, j.page_count, j.created_at,
              s.body_json AS status_json,
              a.body_json AS gaps_json
         FROM jobs j
         LEFT JOIN job_status s ON s.job_id = j.id
         LEFT JOIN artifacts a ON a.job_id = j.id AND a.kind = 'gap_report'
        ORDER BY j.created_at DESC, j.id
        LIMIT ? OFFSET ?`
    )
    .all(options.limit ?? 50, options.offset ?? 0);

  return rows.map((row) => {
    const job = rowToJob(row);
    const status = row.status_json
      ? parseStoredJson<JobStatus>(row.status_json, `job_status(${row.id})`)
      : null;
    const gaps = row.gaps_json
      ? parseStoredJson<GapReport>(row.gaps_json, `artifacts(${row.id}).gap_report`).summary
      : null;
    return {
      ...job,
      state: status && isLoopState(status.state) ? status.state : null,
      step: status?.step ?? null,
      stop_reason: status?.stop_reason ?? null,
      gaps,
    };
  });
}

export function getPages(db: Database.Database, jobId: string): Page[] {
  return db
    .prepare<[string], PageRow>('SELECT page_index, text FROM pages WHERE job_id = ? ORDER BY page_index')
    .all(jobId)
    .map((row) => ({ index: row.page_index, text: row.text }));
}

export function getSeedPages(db: Database.Database, jobId: string): SeedPage[] {
  return db
    .prepare<[string], SeedPageRow>(
      `SELECT page_index, score, labels_json, modalities_json, snippets_json
         FROM seed_pages WHERE job_id = ? ORDER BY score DESC, page_index`
    )
    .all(jobId)
    .map((row) => rowToSeedPage(row, jobId));
}

function writeSeedPages(db: Database.Database, jobId: string, seeds: readonly SeedPage[]): void {
  db.prepare('DELETE FROM seed_pages WHERE job_id = ?').run(jobId);
  const insert = db.prepare(
    `INSERT INTO seed_pages (job_id, page_index, score, labels_json, modalities_json, snippets_json)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(job_id, page_index) DO UPDATE SET score = MAX(score, excluded.score)`
  );
  for (const s of seeds) {
    insert.run(
      jobId,
      s.page,
      s.score,
      JSON.stringify(s.labels),
      JSON.stringify(s.modalities),
      JSON.stringify(s.snippets)
    );
  }
}

/**
 * Replace the job's seed pages wholesale.
 */
export function replaceSeedPages(db: Database.Database, jobId: string, seeds: readonly SeedPage[]): void {
  db.transaction(() => writeSeedPages(db, jobId, seeds))();
}
