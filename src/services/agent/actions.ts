/**
 * Loop actions
 *
 * The two extraction actions the control loop (and the tool surface) can
 * take. Each records a start and a done status update around one pass.
 *
 * @module services/agent/actions
 */

import { emptyGapSummary, type GapSummary } from '../../models/protocol.js';
import type { ProtocolPipeline } from '../protocol/pipeline.js';
import { expandSeedPages } from '../protocol/windowing.js';
import type { JobStore } from '../storage/job-store/index.js';

export const ACTION_BASELINE = 'extract_baseline';
export const ACTION_WIDEN = 'extract_with_window';

export interface BaselineResult {
  gaps: GapSummary;
  seed_pages: number[];
  candidate_count: number;
  summary: string;
}

export interface WidenResult {
  span: number;
  pages: number[];
  before: GapSummary | null;
  after: GapSummary;
  improved: boolean;
  candidate_count: number;
  summary: string;
}

export function clampSpan(span: number, maxSpan: number): number {
  const n = Number.isFinite(span) ? Math.trunc(span) : 0;
  return Math.max(0, Math.min(maxSpan, n));
}

export function formatGaps(g: GapSummary): string {
  return `missing=${g.missing} conflicts=${g.conflicts} ambiguous=${g.ambiguous}`;
}

export class LoopActions {
  constructor(
    private readonly store: JobStore,
    private readonly pipeline: ProtocolPipeline,
    private readonly maxSpan: number
  ) {}

  /**
   * One pass over the triage seed pages exactly as stored.
   */
  async extractBaseline(jobId: string): Promise<BaselineResult> {
    const seeds = this.store.getSeedPages(jobId).map((s) => s.page);
    this.store.mergeStatus(jobId, {
      state: 'baseline_extract',
      step: 'extract.start',
      last_action: ACTION_BASELINE,
      pages: seeds,
    });

    const pass = await this.pipeline.runPass(jobId, seeds, 'baseline');
    const gaps = pass.gapReport.summary;
    const summary = `GAPS ${formatGaps(gaps)}`;

    this.store.mergeStatus(jobId, {
      state: 'baseline_extract',
      step: 'extract.done',
      last_action: ACTION_BASELINE,
      gaps_after: gaps,
      summary,
    });
    return { gaps, seed_pages: seeds, candidate_count: pass.candidateCount, summary };
  }

  /**
   * One pass over the seed pages widened by ±span. `improved` means the
   * missing-field count went down relative to the previous gap report.
   */
  async extractWithWindow(jobId: string, requestedSpan: number): Promise<WidenResult> {
    const span = clampSpan(requestedSpan, this.maxSpan);
    const seeds = this.store.getSeedPages(jobId).map((s) => s.page);
    const pages = expandSeedPages(seeds, span, this.store.getPages(jobId));
    const before = this.store.getGapReport(jobId)?.summary ?? null;

    this.store.mergeStatus(jobId, {
      state: 'retry_widen',
      step: 'reextract_wide.start',
      last_action: ACTION_WIDEN,
      span,
      pages,
    });

    const pass = await this.pipeline.runPass(jobId, pages, `widen span=${span}`);
    const after = pass.gapReport.summary;
    const improved = before !== null && after.missing < before.missing;
    const summary =
      `SPAN ${span}; BEFORE ${formatGaps(before ?? emptyGapSummary())} ` +
      `-> AFTER ${formatGaps(after)}; improved=${improved}`;

    this.store.mergeStatus(jobId, {
      state: 'retry_widen',
      step: 'reextract_wide.done',
      last_action: ACTION_WIDEN,
      gaps_before: before ?? undefined,
      gaps_after: after,
      span,
      improved,
      pages,
      summary,
    });
    return { span, pages, before, after, improved, candidate_count: pass.candidateCount, summary };
  }
}
