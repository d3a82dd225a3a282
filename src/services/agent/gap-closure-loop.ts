/**
 * Gap-Closure Control Loop
 *
 * start → preflight → baseline_extract → retry_widen* → stopped
 *
 * The step budget counts extraction passes (baseline included) and is the
 * only thing besides closed gaps that ends a run. Every transition is
 * merged into the job's status record.
 *
 * @module services/agent/gap-closure-loop
 */

import type { GapSummary, JobStatus, StopReason } from '../../models/protocol.js';
import type { PreflightService } from '../triage/preflight.js';
import type { JobStore } from '../storage/job-store/index.js';
import { clampSpan, formatGaps, type LoopActions } from './actions.js';

export interface LoopOptions {
  maxSteps: number;
  maxSpan: number;
  initialSpan: number;
  preflight: boolean;
  topK: number;
}

export interface LoopResult {
  job_id: string;
  stop_reason: StopReason;
  steps_used: number;
  max_steps: number;
  span: number | null;
  gaps: GapSummary | null;
  status: JobStatus;
}

export type LoopDecision = { kind: 'stop'; reason: StopReason } | { kind: 'widen' };

/**
 * What to do after a pass: stop once missing + conflicts reaches zero,
 * otherwise widen while passes remain.
 */
export function decideNext(gaps: GapSummary, stepsUsed: number, maxSteps: number): LoopDecision {
  if (gaps.missing + gaps.conflicts === 0) return { kind: 'stop', reason: 'gaps_resolved' };
  if (stepsUsed >= maxSteps) return { kind: 'stop', reason: 'budget_exhausted' };
  return { kind: 'widen' };
}

/**
 * Span for the next widen pass: unchanged after an improvement, one wider
 * (up to the ceiling) after a stall.
 */
export function nextSpan(span: number, improved: boolean, maxSpan: number): number {
  return improved ? span : Math.min(maxSpan, span + 1);
}

export class GapClosureLoop {
  private readonly maxSteps: number;

  constructor(
    private readonly store: JobStore,
    private readonly actions: LoopActions,
    private readonly preflight: PreflightService,
    private readonly options: LoopOptions
  ) {
    this.maxSteps = Math.max(1, Math.trunc(options.maxSteps));
  }

  async run(jobId: string): Promise<LoopResult> {
    this.store.requireJob(jobId);
    const maxSteps = this.maxSteps;
    this.store.mergeStatus(jobId, { state: 'start', step: 'agent.start', steps_used: 0, max_steps: maxSteps });
    console.error(`[GapClosureLoop] ${jobId}: start (max_steps=${maxSteps}, max_span=${this.options.maxSpan})`);

    let stepsUsed = 0;
    try {
      if (this.options.preflight) {
        let flags = this.store.getDocFlags(jobId);
        if (!flags) {
          this.store.mergeStatus(jobId, { state: 'preflight', step: 'preflight.start' });
          flags = await this.preflight.runPreflight(jobId);
          this.store.mergeStatus(jobId, { state: 'preflight', step: 'preflight.done' });
        }
        if (!flags.is_imaging) {
          return this.stop(jobId, 'non_imaging', stepsUsed, null, null);
        }
      }

      if (this.store.getSeedPages(jobId).length === 0) {
        this.store.mergeStatus(jobId, { state: 'preflight', step: 'triage.start' });
        const seeds = await this.preflight.runTriage(jobId, this.options.topK);
        this.store.mergeStatus(jobId, { state: 'preflight', step: 'triage.done', pages: seeds.map((s) => s.page) });
      }

      const baseline = await this.actions.extractBaseline(jobId);
      stepsUsed = 1;
      this.store.mergeStatus(jobId, { state: 'baseline_extract', step: 'loop.step', steps_used: stepsUsed });
      let gaps = baseline.gaps;
      console.error(`[GapClosureLoop] ${jobId}: baseline ${formatGaps(gaps)}`);

      let span = clampSpan(this.options.initialSpan, this.options.maxSpan);
      let lastSpan: number | null = null;
      let decision = decideNext(gaps, stepsUsed, maxSteps);

      while (decision.kind === 'widen') {
        const widened = await this.actions.extractWithWindow(jobId, span);
        stepsUsed++;
        lastSpan = widened.span;
        gaps = widened.after;
        this.store.mergeStatus(jobId, { state: 'retry_widen', step: 'loop.step', steps_used: stepsUsed });
        console.error(
          `[GapClosureLoop] ${jobId}: step ${stepsUsed}/${maxSteps} span=${widened.span} ` +
            `${formatGaps(gaps)} improved=${widened.improved}`
        );

        span = nextSpan(widened.span, widened.improved, this.options.maxSpan);
        decision = decideNext(gaps, stepsUsed, maxSteps);
      }

      return this.stop(jobId, decision.reason, stepsUsed, lastSpan, gaps);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[GapClosureLoop] ${jobId}: exception after ${stepsUsed} step(s): ${message}`);
      try {
        this.store.mergeStatus(jobId, {
          state: 'error',
          step: 'agent.error',
          stop_reason: 'exception',
          steps_used: stepsUsed,
          error: message.slice(0, 2000),
        });
      } catch (statusError) {
        console.error(
          `[GapClosureLoop] ${jobId}: could not record error status: ${
            statusError instanceof Error ? statusError.message : String(statusError)
          }`
        );
      }
      throw error;
    }
  }

  private stop(
    jobId: string,
    reason: StopReason,
    stepsUsed: number,
    span: number | null,
    gaps: GapSummary | null
  ): LoopResult {
    const status = this.store.mergeStatus(jobId, {
      state: 'stopped',
      step: 'completed',
      stop_reason: reason,
      steps_used: stepsUsed,
      max_steps: this.maxSteps,
      gaps_after: gaps ?? undefined,
    });
    console.error(`[GapClosureLoop] ${jobId}: stopped (${reason}) after ${stepsUsed} step(s)`);
    return { job_id: jobId, stop_reason: reason, steps_used: stepsUsed, max_steps: this.maxSteps, span, gaps, status };
  }
}
