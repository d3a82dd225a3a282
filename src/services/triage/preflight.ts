/**
 * Preflight & Page Triage
 *
 * Document-level checks that run before extraction: is this an imaging
 * paper at all, what is its title, and which pages are worth extracting
 * from. Every capability failure degrades to a safe default here.
 *
 * @module services/triage/preflight
 */

import { z } from 'zod';

import type { DocFlags, Page, SeedPage } from '../../models/protocol.js';
import type { ProposalClient } from '../llm/client.js';
import { proposeStructured } from '../llm/structured.js';
import {
  IMAGING_VERDICT_SYSTEM,
  PAGE_TRIAGE_SYSTEM,
  TITLE_SYSTEM,
  imagingVerdictUserPrompt,
  pageTriageUserPrompt,
  titleUserPrompt,
} from '../protocol/prompts.js';
import { PAGE_SEPARATOR } from '../protocol/windowing.js';
import type { JobStore } from '../storage/job-store/index.js';

export const VERDICT_PAGES = 3;
export const VERDICT_MAX_CHARS = 6000;
export const TITLE_PAGES = 2;
export const TITLE_MAX_CHARS = 3000;
export const MAX_TITLE_LENGTH = 300;
export const TRIAGE_PAGE_MAX_CHARS = 4000;
export const DEFAULT_TOP_K = 6;

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const stringList = z
  .array(z.unknown())
  .nullish()
  .transform((xs) =>
    (xs ?? []).filter((x): x is string => typeof x === 'string' && x.trim().length > 0).map((x) => x.trim())
  );

const score01 = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    const n = typeof v === 'number' ? v : Number(v ?? 0);
    return Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0;
  });

const VerdictSchema = z.object({
  is_imaging: z.boolean(),
  modalities: stringList,
  confidence: score01,
  reasons: stringList,
  counter_signals: stringList,
});

const TitleSchema = z.object({
  title: z.string().nullish(),
  confidence: score01,
});

const PageClassSchema = z.object({
  labels: stringList,
  modalities: stringList,
  score: score01,
  evidence: stringList,
});

export type ImagingVerdict = z.infer<typeof VerdictSchema>;

export interface TitleGuess {
  title: string;
  confidence: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function earlyText(pages: readonly Page[], count: number, maxChars: number): string {
  return [...pages]
    .sort((a, b) => a.index - b.index)
    .slice(0, count)
    .map((p) => p.text.trim())
    .filter((t) => t.length > 0)
    .join(PAGE_SEPARATOR)
    .slice(0, maxChars);
}

/**
 * Collapse whitespace, cap the length, and drop a leading "Abstract" label.
 */
export function cleanTitle(raw: string): string {
  let title = raw.split(/\s+/).filter(Boolean).join(' ');
  if (title.length > MAX_TITLE_LENGTH) {
    title = `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
  }
  if (title.toLowerCase().startsWith('abstract')) {
    title = title.slice('abstract'.length).replace(/^[\s:-]+|[\s:-]+$/g, '');
  }
  return title;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CAPABILITY CALLS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Whether the document reports imaging methods. A failed or malformed call
 * yields a non-imaging verdict that says why.
 */
export async function imagingVerdict(
  client: ProposalClient,
  pages: readonly Page[],
  label = 'verdict'
): Promise<ImagingVerdict> {
  const text = earlyText(pages, VERDICT_PAGES, VERDICT_MAX_CHARS);
  const outcome = await proposeStructured(
    client,
    IMAGING_VERDICT_SYSTEM,
    imagingVerdictUserPrompt(text),
    VerdictSchema,
    label
  );
  if (outcome.kind === 'valid') return outcome.value;

  const cause = outcome.kind === 'capability_error' ? outcome.error : outcome.issues.join('; ');
  return {
    is_imaging: false,
    modalities: [],
    confidence: 0,
    reasons: [`capability error: ${cause.slice(0, 120)}`],
    counter_signals: ['fallback verdict'],
  };
}

export async function inferTitle(
  client: ProposalClient,
  pages: readonly Page[],
  label = 'title'
): Promise<TitleGuess> {
  const text = earlyText(pages, TITLE_PAGES, TITLE_MAX_CHARS);
  if (!text) return { title: '', confidence: 0 };

  const outcome = await proposeStructured(client, TITLE_SYSTEM, titleUserPrompt(text), TitleSchema, label);
  if (outcome.kind !== 'valid') return { title: '', confidence: 0 };

  return { title: cleanTitle(outcome.value.title ?? ''), confidence: outcome.value.confidence };
}

/**
 * Classify every non-empty page and keep the top `topK` by score among pages
 * labelled methods/acquisition or naming a modality. Pages whose call fails
 * are skipped.
 */
export async function triagePages(
  client: ProposalClient,
  pages: readonly Page[],
  topK: number = DEFAULT_TOP_K,
  label = 'triage'
): Promise<SeedPage[]> {
  const kept: SeedPage[] = [];

  for (const page of pages) {
    const text = page.text.trim();
    if (!text) continue;

    const outcome = await proposeStructured(
      client,
      PAGE_TRIAGE_SYSTEM,
      pageTriageUserPrompt(text.slice(0, TRIAGE_PAGE_MAX_CHARS)),
      PageClassSchema,
      `${label} page ${page.index}`
    );
    if (outcome.kind !== 'valid') continue;

    const { labels, modalities, score, evidence } = outcome.value;
    const relevant = labels.includes('methods') || labels.includes('acquisition') || modalities.length > 0;
    if (relevant && score > 0) {
      kept.push({
        page: page.index,
        score,
        labels: [...new Set(labels)],
        modalities,
        snippets: evidence.slice(0, 3),
      });
    }
  }

  return kept.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export interface TriageResult {
  flags: DocFlags;
  seedPages: SeedPage[];
}

/**
 * Runs the preflight calls for a job and records their results.
 */
export class PreflightService {
  constructor(
    private readonly store: JobStore,
    private readonly client: ProposalClient
  ) {}

  /**
   * Verdict and title. The job title is only filled in when the job has
   * none.
   */
  async runPreflight(jobId: string): Promise<DocFlags> {
    const job = this.store.requireJob(jobId);
    const pages = this.store.getPages(jobId);

    const verdict = await imagingVerdict(this.client, pages, `${jobId} verdict`);
    const title = await inferTitle(this.client, pages, `${jobId} title`);

    const flags: DocFlags = {
      schema_version: 1,
      is_imaging: verdict.is_imaging,
      modalities: verdict.modalities,
      confidence: verdict.confidence,
      reasons: verdict.reasons.slice(0, 3),
      counter_signals: verdict.counter_signals.slice(0, 2),
      title: title.title,
      title_confidence: title.confidence,
    };

    this.store.transaction(() => {
      this.store.putDocFlags(jobId, flags);
      if (!job.title && title.title) this.store.setJobTitle(jobId, title.title);
    });

    console.error(
      `[Preflight] ${jobId}: is_imaging=${flags.is_imaging} modalities=[${flags.modalities.join(',')}] ` +
        `confidence=${flags.confidence.toFixed(2)}`
    );
    return flags;
  }

  async runTriage(jobId: string, topK: number = DEFAULT_TOP_K): Promise<SeedPage[]> {
    const pages = this.store.getPages(jobId);
    const seeds = await triagePages(this.client, pages, topK, `${jobId} triage`);
    this.store.replaceSeedPages(jobId, seeds);
    console.error(`[Preflight] ${jobId}: ${seeds.length} seed page(s): [${seeds.map((s) => s.page).join(',')}]`);
    return seeds;
  }

  async runAll(jobId: string, topK: number = DEFAULT_TOP_K): Promise<TriageResult> {
    const flags = await this.runPreflight(jobId);
    const seedPages = await this.runTriage(jobId, topK);
    return { flags, seedPages };
  }
}
