/**
 * Extraction Pass
 *
 * One pass = extract → group → adjudicate → analyze gaps, then persist the
 * candidate log, winner set and gap report together. Stage failures against
 * the capability are absorbed inside the stages; only storage errors and
 * bugs propagate.
 *
 * @module services/protocol/pipeline
 */

import type { GapReport, GroupedRepresentatives, WinnerSet } from '../../models/protocol.js';
import type { ProposalClient } from '../llm/client.js';
import type { JobStore } from '../storage/job-store/index.js';
import { adjudicate } from './adjudication.js';
import { resolveProfile, type DomainProfile } from './domains.js';
import { DEFAULT_WINDOW_SPAN, extractCandidates } from './extraction.js';
import { analyzeGaps } from './gap-analysis.js';
import { DEFAULT_PER_FIELD_LIMIT, groupRepresentatives } from './normalization.js';

export interface PipelineOptions {
  windowSpan?: number;
  perFieldLimit?: number;
}

export interface PassOutcome {
  profile: DomainProfile;
  seedPages: number[];
  candidateCount: number;
  grouped: GroupedRepresentatives;
  winners: WinnerSet;
  gapReport: GapReport;
}

export class ProtocolPipeline {
  private readonly windowSpan: number;
  private readonly perFieldLimit: number;

  constructor(
    private readonly store: JobStore,
    private readonly client: ProposalClient,
    options: PipelineOptions = {}
  ) {
    this.windowSpan = options.windowSpan ?? DEFAULT_WINDOW_SPAN;
    this.perFieldLimit = options.perFieldLimit ?? DEFAULT_PER_FIELD_LIMIT;
  }

  /**
   * Profile for the job: its explicit domain, or under 'auto' the modalities
   * preflight recorded.
   */
  profileFor(jobId: string): DomainProfile {
    const job = this.store.requireJob(jobId);
    const flags = this.store.getDocFlags(jobId);
    return resolveProfile(job.domain, flags?.modalities ?? []);
  }

  async runPass(jobId: string, seedPages: readonly number[], label: string): Promise<PassOutcome> {
    const profile = this.profileFor(jobId);
    const pages = this.store.getPages(jobId);
    const modality = this.store.getDocFlags(jobId)?.modalities ?? [];
    const tag = `${jobId} ${label}`;

    const candidates = await extractCandidates(this.client, profile, pages, seedPages, {
      windowSpan: this.windowSpan,
      label: tag,
    });

    const grouped = groupRepresentatives(candidates, profile, this.perFieldLimit);
    const winners = await adjudicate(this.client, profile, grouped, { modality, label: tag });
    const gapReport = analyzeGaps(profile, winners, grouped, {
      modality,
      candidateCount: candidates.length,
    });

    // candidate log, winners and gap report land together or not at all
    this.store.transaction(() => {
      this.store.replaceCandidates(jobId, candidates);
      this.store.replacePassOutcome(jobId, winners, gapReport);
    });

    console.error(
      `[Pipeline] ${tag}: domain=${profile.id} seeds=[${seedPages.join(',')}] candidates=${candidates.length} ` +
        `winners=${Object.keys(winners.fields).length} missing=${gapReport.summary.missing} ` +
        `conflicts=${gapReport.summary.conflicts} ambiguous=${gapReport.summary.ambiguous}`
    );

    return {
      profile,
      seedPages: [...seedPages],
      candidateCount: candidates.length,
      grouped,
      winners,
      gapReport,
    };
  }
}
