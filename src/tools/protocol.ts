/**
 * Protocol Extraction MCP Tools
 *
 * Tools: protocol_triage, protocol_extract, protocol_extract_window,
 * protocol_run
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/protocol
 */

import type { ServerContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import { openGapCount } from '../services/protocol/gap-analysis.js';
import { ExtractWindowInput, JobRefInput, TriageInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

function triageHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(TriageInput, params);
      ctx.store.requireJob(input.job_id);

      const flags = input.skip_preflight
        ? ctx.store.getDocFlags(input.job_id)
        : await ctx.preflight.runPreflight(input.job_id);
      const seedPages = await ctx.preflight.runTriage(input.job_id, input.top_k);

      return formatResponse(
        successResult({
          job_id: input.job_id,
          doc_flags: flags,
          seed_pages: seedPages,
          next_steps:
            flags && !flags.is_imaging
              ? [{ tool: 'protocol_status', description: 'Document classified as non-imaging; review doc_flags' }]
              : [{ tool: 'protocol_extract', description: 'Run the baseline extraction pass' }],
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function extractHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(JobRefInput, params);
      ctx.store.requireJob(input.job_id);
      const result = await ctx.actions.extractBaseline(input.job_id);
      const open = result.gaps.missing + result.gaps.conflicts;

      return formatResponse(
        successResult({
          job_id: input.job_id,
          ...result,
          missing: result.gaps.missing,
          conflicts: result.gaps.conflicts,
          ambiguous: result.gaps.ambiguous,
          next_steps:
            open > 0
              ? [
                  {
                    tool: 'protocol_extract_window',
                    description: `Widen the window (span ${ctx.config.loop.initialSpan})`,
                  },
                ]
              : [{ tool: 'protocol_artifacts', description: 'Read the winners and gap report' }],
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function extractWindowHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(ExtractWindowInput, params);
      ctx.store.requireJob(input.job_id);
      const result = await ctx.actions.extractWithWindow(input.job_id, input.span);
      const gapReport = ctx.store.getGapReport(input.job_id);
      const open = gapReport ? openGapCount(gapReport) : 0;

      return formatResponse(
        successResult({
          job_id: input.job_id,
          ...result,
          requested_span: input.span,
          next_steps:
            open === 0
              ? [{ tool: 'protocol_artifacts', description: 'Gaps closed; read the winners' }]
              : [
                  {
                    tool: 'protocol_extract_window',
                    description: result.improved
                      ? `Improved; retry at span ${result.span}`
                      : `No improvement; retry at span ${Math.min(ctx.config.loop.maxSpan, result.span + 1)}`,
                  },
                ],
        })
      );
    } catch (error) {
      return handleError(error);
    }
  };
}

function runHandler(ctx: ServerContext) {
  return async (params: Record<string, unknown>): Promise<ToolResponse> => {
    try {
      const input = validateInput(JobRefInput, params);
      const result = await ctx.loop.run(input.job_id);
      return formatResponse(successResult(result));
    } catch (error) {
      return handleError(error);
    }
  };
}

export function createProtocolTools(ctx: ServerContext): Record<string, ToolDefinition> {
  return {
    protocol_triage: {
      description:
        'Classify the document (imaging verdict, title) and pick the top_k seed pages. skip_preflight=true only re-runs page triage.',
      inputSchema: TriageInput.shape,
      handler: triageHandler(ctx),
    },
    protocol_extract: {
      description:
        '[ESSENTIAL] Baseline pass over the seed pages: extract candidates, adjudicate winners, rebuild the gap report.',
      inputSchema: JobRefInput.shape,
      handler: extractHandler(ctx),
    },
    protocol_extract_window: {
      description:
        'Widen every seed page by ±span (clamped to the configured maximum) and re-run the pass. Reports gap counts before and after and whether missing fields went down.',
      inputSchema: ExtractWindowInput.shape,
      handler: extractWindowHandler(ctx),
    },
    protocol_run: {
      description:
        '[ESSENTIAL] Run the full gap-closure loop (preflight, triage, baseline, widening retries) until gaps close or the step budget runs out.',
      inputSchema: JobRefInput.shape,
      handler: runHandler(ctx),
    },
  };
}
