/**
 * Export a job's artifacts as files
 *
 * candidates.jsonl, winners.json, gap_report.json, doc_flags.json and
 * status.json. Each file is written to a temp name and renamed into place,
 * so a reader sees either the old file or the new one.
 */

import { existsSync, mkdirSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';

import type { JobStore } from './service.js';
import { JobStoreError, JobStoreErrorCode } from './types.js';

export const EXPORT_FILES = {
  candidates: 'candidates.jsonl',
  winners: 'winners.json',
  gapReport: 'gap_report.json',
  docFlags: 'doc_flags.json',
  status: 'status.json',
} as const;

export interface ExportResult {
  job_id: string;
  directory: string;
  files: string[];
  candidate_count: number;
}

export function writeFileAtomic(path: string, content: string): void {
  const tmp = `${path}.tmp-${process.pid}-${Date.now()}`;
  try {
    writeFileSync(tmp, content, 'utf-8');
    renameSync(tmp, path);
  } catch (error) {
    rmSync(tmp, { force: true });
    throw new JobStoreError(
      `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`,
      JobStoreErrorCode.STORAGE_ERROR,
      error
    );
  }
}

/**
 * Artifacts that do not exist yet are skipped; the candidate log is always
 * written, possibly empty.
 * @throws JobStoreError JOB_NOT_FOUND
 */
export function exportJobArtifacts(store: JobStore, jobId: string, directory: string): ExportResult {
  store.requireJob(jobId);

  if (existsSync(directory) && !statSync(directory).isDirectory()) {
    throw new JobStoreError(`Export target is not a directory: ${directory}`, JobStoreErrorCode.STORAGE_ERROR);
  }
  mkdirSync(directory, { recursive: true });

  const files: string[] = [];
  const candidates = store.getCandidates(jobId);
  const jsonl = candidates.map((c) => JSON.stringify(c)).join('\n');
  writeFileAtomic(join(directory, EXPORT_FILES.candidates), candidates.length > 0 ? `${jsonl}\n` : '');
  files.push(EXPORT_FILES.candidates);

  const documents: Array<[string, unknown]> = [
    [EXPORT_FILES.winners, store.getWinners(jobId)],
    [EXPORT_FILES.gapReport, store.getGapReport(jobId)],
    [EXPORT_FILES.docFlags, store.getDocFlags(jobId)],
    [EXPORT_FILES.status, store.getStatus(jobId)],
  ];
  for (const [name, body] of documents) {
    if (body === null) continue;
    writeFileAtomic(join(directory, name), `${JSON.stringify(body, null, 2)}\n`);
    files.push(name);
  }

  console.error(`[JobStore] Exported ${files.length} file(s) for job ${jobId} to ${directory}`);
  return { job_id: jobId, directory, files, candidate_count: candidates.length };
}
