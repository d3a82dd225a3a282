/**
 * Job status: a merged document plus an append-only transition history
 *
 * @module job-store/status-operations
 */

import type Database from 'better-sqlite3';

import type { JobStatus, JobStatusUpdate, StatusTransition } from '../../../models/protocol.js';
import { isLoopState, parseStoredJson } from './converters.js';
import type { JobStatusRow, StatusTransitionRow } from './types.js';

export function getStatus(db: Database.Database, jobId: string): JobStatus | null {
  const row = db
    .prepare<[string], JobStatusRow>('SELECT body_json FROM job_status WHERE job_id = ?')
    .get(jobId);
  return row ? parseStoredJson<JobStatus>(row.body_json, `job_status(${jobId})`) : null;
}

/**
 * Merge `update` into the stored status: keys in the update overwrite,
 * everything else keeps its stored value; undefined values never overwrite.
 * The update is appended to status_transitions in the same transaction.
 */
export function mergeStatus(db: Database.Database, jobId: string, update: JobStatusUpdate): JobStatus {
  const now = new Date().toISOString();
  // JSON round trip drops keys whose value is undefined
  const defined = parseStoredJson<JobStatusUpdate>(JSON.stringify(update), `status update(${jobId})`);

  return db.transaction((): JobStatus => {
    const previous = getStatus(db, jobId);
    const merged: JobStatus = {
      ...previous,
      ...defined,
      schema_version: 1,
      job_id: jobId,
      updated_at: now,
    };

    db.prepare(
      `INSERT INTO job_status (job_id, state, step, body_json, updated_at) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(job_id) DO UPDATE SET state = excluded.state, step = excluded.step,
         body_json = excluded.body_json, updated_at = excluded.updated_at`
    ).run(jobId, merged.state, merged.step, JSON.stringify(merged), now);

    db.prepare(
      'INSERT INTO status_transitions (job_id, state, step, update_json, created_at) VALUES (?, ?, ?, ?, ?)'
    ).run(jobId, update.state, update.step, JSON.stringify(defined), now);

    return merged;
  })();
}

export function listTransitions(db: Database.Database, jobId: string, limit = 200): StatusTransition[] {
  return db
    .prepare<[string, number], StatusTransitionRow>(
      `SELECT id, job_id, state, step, update_json, created_at
         FROM status_transitions WHERE job_id = ? ORDER BY id LIMIT ?`
    )
    .all(jobId, limit)
    .filter((row) => isLoopState(row.state))
    .map((row) => {
      const update = parseStoredJson<JobStatusUpdate>(row.update_json, `status_transitions(${row.id})`);
      return {
        id: row.id,
        job_id: row.job_id,
        state: update.state,
        step: row.step,
        update,
        created_at: row.created_at,
      };
    });
}
