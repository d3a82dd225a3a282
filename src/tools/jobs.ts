/**
 * Job MCP Tools
 *
 * Tools: protocol_job_create, protocol_job_list, protocol_status,
 * protocol_artifacts, protocol_export
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/jobs
 */

import { existsSync } from 'fs';
import { dirname, resolve } from 'path';

import type { ServerContext } from '../server/context.js';
import { pathNotFoundError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import { exportJobArtifacts } from '../services/storage/job-store/index.js';
import {
  ArtifactsInput,
  ExportInput,
  JobCreateInput,
  JobListInput,
  StatusInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function createJobHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(JobCreateInput, params);
      const job = ctx.store.createJob({
        id: input.job_id,
        title: input.title,
        domain: input.domain ?? ctx.config.domain,
        pages: input.pages,
        seedPages: input.seed_pages,
      });
      const seedCount = ctx.store.getSeedPages(job.id).length;

      return formatResponse(
        successResult({
          job,
          seed_pages: seedCount,
          next_steps:
            seedCount > 0
              ? [{ tool: 'protocol_run', description: 'Run the gap-closure loop over the given seed pages' }]
              : [
                  { tool: 'protocol_triage', description: 'Classify the document and pick seed pages' },
                  { tool: 'protocol_run', description: 'Or run the whole loop, which triages first' },
                ],
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function listJobsHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(JobListInput, params);
      const jobs = ctx.store.listJobs({ limit: input.limit, offset: input.offset });
      return formatResponse(
        successResult({ jobs, count: jobs.length, limit: input.limit, offset: input.offset })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function statusHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(StatusInput, params);
      const job = ctx.store.requireJob(input.job_id);
      const status = ctx.store.getStatus(input.job_id);
      return formatResponse(
        successResult({
          job,
          status,
          history: input.include_history ? ctx.store.listTransitions(input.job_id, input.history_limit) : undefined,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function artifactsHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(ArtifactsInput, params);
      const jobId = input.job_id;
      ctx.store.requireJob(jobId);
      const include = new Set(input.include);

      const data: Record<string, unknown> = { job_id: jobId };
      if (include.has('seed_pages')) data.seed_pages = ctx.store.getSeedPages(jobId);
      if (include.has('candidates')) {
        const all = ctx.store.getCandidates(jobId);
        data.candidates = all.slice(input.candidate_offset, input.candidate_offset + input.candidate_limit);
        data.candidate_total = all.length;
      }
      if (include.has('winners')) data.winners = ctx.store.getWinners(jobId);
      if (include.has('gap_report')) data.gap_report = ctx.store.getGapReport(jobId);
      if (include.has('doc_flags')) data.doc_flags = ctx.store.getDocFlags(jobId);

      return formatResponse(successResult(data));
    } catch (error) {
      return handleError(error);
    }
  };
}

function exportHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(ExportInput, params);
      const directory = resolve(input.output_dir);
      // the target itself may be created, but not its parent
      if (!existsSync(dirname(directory))) {
        throw pathNotFoundError(dirname(directory));
      }
      const result = exportJobArtifacts(ctx.store, input.job_id, directory);
      return formatResponse(successResult(result));
    } catch (error) {
      return handleError(error);
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export function createJobTools(ctx: ServerContext): Record<string, ToolDefinition> {
  return {
    protocol_job_create: {
      description:
        '[ESSENTIAL] Register a document as a job from its page texts (strings or {index, text}). Optional seed_pages skip triage; domain is ct, mri or auto.',
      inputSchema: JobCreateInput.shape,
      handler: createJobHandler(ctx),
    },
    protocol_job_list: {
      description: 'List jobs, newest first, with their latest loop state and gap counts.',
      inputSchema: JobListInput.shape,
      handler: listJobsHandler(ctx),
    },
    protocol_status: {
      description: 'Current status record of a job and its transition history.',
      inputSchema: StatusInput.shape,
      handler: statusHandler(ctx),
    },
    protocol_artifacts: {
      description:
        'Read a job\'s artifacts: seed_pages, candidates (paged), winners, gap_report, doc_flags.',
      inputSchema: ArtifactsInput.shape,
      handler: artifactsHandler(ctx),
    },
    protocol_export: {
      description:
        'Write candidates.jsonl, winners.json, gap_report.json, doc_flags.json and status.json into a directory.',
      inputSchema: ExportInput.shape,
      handler: exportHandler(ctx),
    },
  };
}
