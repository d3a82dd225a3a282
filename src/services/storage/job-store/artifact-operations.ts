/**
 * Candidate log and artifact operations
 *
 * Each pass replaces the candidate log, then the winner set and gap report,
 * each write inside a transaction: readers never see half a pass.
 *
 * @module job-store/artifact-operations
 */

import type Database from 'better-sqlite3';

import type { Candidate, DocFlags, GapReport, WinnerSet } from '../../../models/protocol.js';
import { parseStoredJson, rowToCandidate } from './converters.js';
import type { ArtifactKind, ArtifactRow, CandidateRow } from './types.js';

interface ArtifactBodies {
  winners: WinnerSet;
  gap_report: GapReport;
  doc_flags: DocFlags;
}

/**
 * Truncate the job's candidate log and append `candidates` in order.
 */
export function replaceCandidates(db: Database.Database, jobId: string, candidates: readonly Candidate[]): void {
  const insert = db.prepare(
    `INSERT INTO candidates (job_id, seq, field, page, raw_span, value_json, units, evidence, confidence, notes)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  db.transaction(() => {
    db.prepare('DELETE FROM candidates WHERE job_id = ?').run(jobId);
    candidates.forEach((c, seq) => {
      insert.run(
        jobId,
        seq,
        c.field,
        c.page,
        c.raw_span,
        JSON.stringify(c.value),
        c.units,
        c.evidence,
        c.confidence,
        c.notes
      );
    });
  })();
}

export function getCandidates(db: Database.Database, jobId: string): Candidate[] {
  return db
    .prepare<[string], CandidateRow>(
      `SELECT seq, field, page, raw_span, value_json, units, evidence, confidence, notes
         FROM candidates WHERE job_id = ? ORDER BY seq`
    )
    .all(jobId)
    .map((row) => rowToCandidate(row, jobId));
}

export function countCandidates(db: Database.Database, jobId: string): number {
  const row = db
    .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM candidates WHERE job_id = ?')
    .get(jobId);
  return row?.n ?? 0;
}

function upsertArtifact(db: Database.Database, jobId: string, kind: ArtifactKind, body: unknown): void {
  db.prepare(
    `INSERT INTO artifacts (job_id, kind, body_json, updated_at) VALUES (?, ?, ?, ?)
     ON CONFLICT(job_id, kind) DO UPDATE SET body_json = excluded.body_json, updated_at = excluded.updated_at`
  ).run(jobId, kind, JSON.stringify(body), new Date().toISOString());
}

export function putArtifact<K extends ArtifactKind>(
  db: Database.Database,
  jobId: string,
  kind: K,
  body: ArtifactBodies[K]
): void {
  upsertArtifact(db, jobId, kind, body);
}

export function getArtifact<K extends ArtifactKind>(
  db: Database.Database,
  jobId: string,
  kind: K
): ArtifactBodies[K] | null {
  const row = db
    .prepare<[string, string], ArtifactRow>(
      'SELECT body_json, updated_at FROM artifacts WHERE job_id = ? AND kind = ?'
    )
    .get(jobId, kind);
  return row ? parseStoredJson<ArtifactBodies[K]>(row.body_json, `artifacts(${jobId}).${kind}`) : null;
}

/**
 * Write the winner set and gap report of one pass together.
 */
export function replacePassOutcome(
  db: Database.Database,
  jobId: string,
  winners: WinnerSet,
  gapReport: GapReport
): void {
  db.transaction(() => {
    upsertArtifact(db, jobId, 'winners', winners);
    upsertArtifact(db, jobId, 'gap_report', gapReport);
  })();
}
