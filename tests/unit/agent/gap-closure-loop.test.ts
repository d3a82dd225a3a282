/**
 * Unit tests for the gap-closure control loop
 *
 * Runs the real pipeline against a temp SQLite store with a scripted
 * capability client.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { GapSummary } from '../../../src/models/protocol.js';
import { LoopActions } from '../../../src/services/agent/actions.js';
import {
  GapClosureLoop,
  decideNext,
  nextSpan,
  type LoopOptions,
} from '../../../src/services/agent/gap-closure-loop.js';
import { ProtocolPipeline } from '../../../src/services/protocol/pipeline.js';
import { JobStoreError } from '../../../src/services/storage/job-store/index.js';
import { PreflightService } from '../../../src/services/triage/preflight.js';
import { openTempStore, type TempStore } from '../helpers.js';
import { ALL_CANDIDATES, ALL_WINNERS, NO_CANDIDATES, routedClient, type RoutedClient } from './fixtures.js';

const gaps = (missing: number, conflicts = 0): GapSummary => ({
  missing,
  missing_low_conf: 0,
  ambiguous: 0,
  conflicts,
  questions: 0,
});

const DEFAULTS: LoopOptions = { maxSteps: 7, maxSpan: 4, initialSpan: 2, preflight: false, topK: 6 };

describe('decideNext', () => {
  it('stops once missing and conflicts are both zero', () => {
    expect(decideNext({ ...gaps(0), ambiguous: 4 }, 1, 7)).toEqual({ kind: 'stop', reason: 'gaps_resolved' });
  });

  it('stops when the budget is spent', () => {
    expect(decideNext(gaps(2), 7, 7)).toEqual({ kind: 'stop', reason: 'budget_exhausted' });
  });

  it('widens while gaps and budget remain', () => {
    expect(decideNext(gaps(0, 1), 3, 7)).toEqual({ kind: 'widen' });
  });

  it('prefers gaps_resolved on the last step', () => {
    expect(decideNext(gaps(0), 7, 7)).toEqual({ kind: 'stop', reason: 'gaps_resolved' });
  });
});

describe('nextSpan', () => {
  it('keeps the span after an improvement', () => {
    expect(nextSpan(2, true, 4)).toBe(2);
  });

  it('widens by one after a stall, up to the ceiling', () => {
    expect(nextSpan(2, false, 4)).toBe(3);
    expect(nextSpan(4, false, 4)).toBe(4);
  });
});

describe('GapClosureLoop', () => {
  let temp: TempStore;

  beforeEach(() => {
    temp = openTempStore('protocol-loop-');
  });

  afterEach(() => {
    temp.cleanup();
  });

  function buildLoop(client: RoutedClient, options: Partial<LoopOptions> = {}) {
    const merged = { ...DEFAULTS, ...options };
    const pipeline = new ProtocolPipeline(temp.store, client);
    const actions = new LoopActions(temp.store, pipeline, merged.maxSpan);
    const preflight = new PreflightService(temp.store, client);
    return { loop: new GapClosureLoop(temp.store, actions, preflight, merged), actions };
  }

  function createJob(pageCount: number, seedPages?: number[]): string {
    const texts = Array.from({ length: pageCount }, (_, i) => `Page ${i} text`);
    return temp.store.createJob({
      id: 'job-1',
      domain: 'ct',
      pages: texts.map((text, index) => ({ index, text })),
      seedPages,
    }).id;
  }

  it('stops with gaps_resolved right after a complete baseline', async () => {
    const jobId = createJob(4, [1]);
    const client = routedClient({ extraction: () => ALL_CANDIDATES, adjudication: ALL_WINNERS });
    const { loop } = buildLoop(client);

    const result = await loop.run(jobId);

    expect(result.stop_reason).toBe('gaps_resolved');
    expect(result.steps_used).toBe(1);
    expect(result.span).toBeNull();
    expect(result.gaps?.missing).toBe(0);
    expect(client.propose).toHaveBeenCalledTimes(2);
    expect(Object.keys(temp.store.getWinners(jobId)?.fields ?? {})).toHaveLength(7);
    expect(temp.store.getStatus(jobId)).toMatchObject({
      state: 'stopped',
      step: 'completed',
      stop_reason: 'gaps_resolved',
      steps_used: 1,
      max_steps: 7,
    });
  });

  it('widens on stalls and stops with budget_exhausted', async () => {
    const jobId = createJob(6, [2]);
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const { loop } = buildLoop(client, { maxSteps: 3 });

    const result = await loop.run(jobId);

    expect(result.stop_reason).toBe('budget_exhausted');
    expect(result.steps_used).toBe(3);
    expect(result.span).toBe(3);
    expect(result.gaps?.missing).toBe(7);
    // 1 baseline window, then 5 at span 2 and 6 at span 3; nothing to adjudicate
    expect(client.extractionCalls()).toBe(12);
    expect(client.propose).toHaveBeenCalledTimes(12);

    const widenStarts = temp.store
      .listTransitions(jobId)
      .filter((t) => t.step === 'reextract_wide.start')
      .map((t) => ({ span: t.update.span, pages: t.update.pages }));
    expect(widenStarts).toEqual([
      { span: 2, pages: [0, 1, 2, 3, 4] },
      { span: 3, pages: [0, 1, 2, 3, 4, 5] },
    ]);

    const improvedFlags = temp.store
      .listTransitions(jobId)
      .filter((t) => t.step === 'reextract_wide.done')
      .map((t) => t.update.improved);
    expect(improvedFlags).toEqual([false, false]);

    const budgetCounts = temp.store
      .listTransitions(jobId)
      .filter((t) => t.step === 'loop.step')
      .map((t) => t.update.steps_used);
    expect(budgetCounts).toEqual([1, 2, 3]);
    expect(temp.store.getGapReport(jobId)?.policy).toBe('rule_gap_v1_stub');
  });

  it('never widens past the span ceiling', async () => {
    const jobId = createJob(10, [5]);
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const { loop } = buildLoop(client, { maxSteps: 5, initialSpan: 2, maxSpan: 3 });

    const result = await loop.run(jobId);

    const spans = temp.store
      .listTransitions(jobId)
      .filter((t) => t.step === 'reextract_wide.start')
      .map((t) => t.update.span);
    expect(spans).toEqual([2, 3, 3, 3]);
    expect(result.steps_used).toBe(5);
  });

  it('records an improvement and stops once the widened pass closes the gaps', async () => {
    const jobId = createJob(4, [1]);
    const client = routedClient({
      extraction: (call) => (call === 0 ? NO_CANDIDATES : ALL_CANDIDATES),
      adjudication: ALL_WINNERS,
    });
    const { loop } = buildLoop(client);

    const result = await loop.run(jobId);

    expect(result.stop_reason).toBe('gaps_resolved');
    expect(result.steps_used).toBe(2);
    expect(result.span).toBe(2);
    // seed 1 at span 2 covers pages 0-3
    expect(client.extractionCalls()).toBe(5);
    expect(temp.store.getStatus(jobId)).toMatchObject({
      improved: true,
      gaps_before: { missing: 7 },
      gaps_after: { missing: 0, conflicts: 0 },
      span: 2,
      pages: [0, 1, 2, 3],
    });
  });

  it('stops with non_imaging when preflight says so', async () => {
    const jobId = createJob(3, [0]);
    const client = routedClient({
      verdict: JSON.stringify({
        is_imaging: false,
        modalities: [],
        confidence: 0.9,
        reasons: [],
        counter_signals: ['survey of market prices'],
      }),
      title: '{"title": "Market Dynamics", "confidence": 0.8}',
    });
    const { loop } = buildLoop(client, { preflight: true });

    const result = await loop.run(jobId);

    expect(result).toMatchObject({ stop_reason: 'non_imaging', steps_used: 0, span: null, gaps: null });
    expect(client.extractionCalls()).toBe(0);
    expect(temp.store.getDocFlags(jobId)?.is_imaging).toBe(false);
    expect(temp.store.requireJob(jobId).title).toBe('Market Dynamics');
    expect(temp.store.listTransitions(jobId).map((t) => t.step)).toEqual([
      'agent.start',
      'preflight.start',
      'preflight.done',
      'completed',
    ]);
  });

  it('reuses stored doc flags instead of asking again', async () => {
    const jobId = createJob(3, [0]);
    temp.store.putDocFlags(jobId, {
      schema_version: 1,
      is_imaging: true,
      modalities: ['CT'],
      confidence: 0.9,
      reasons: ['kVp'],
      counter_signals: [],
      title: '',
      title_confidence: 0,
    });
    const client = routedClient({ extraction: () => ALL_CANDIDATES, adjudication: ALL_WINNERS });
    const { loop } = buildLoop(client, { preflight: true });

    const result = await loop.run(jobId);

    expect(result.stop_reason).toBe('gaps_resolved');
    expect(client.propose).toHaveBeenCalledTimes(2);
  });

  it('triages pages when the job has no seed pages', async () => {
    const pages = ['Title page', 'Methods: CT at 120 kVp', 'References'];
    temp.store.createJob({ id: 'job-2', domain: 'ct', pages: pages.map((text, index) => ({ index, text })) });
    const client = routedClient({
      triage: (user) =>
        user.includes('120 kVp')
          ? '{"labels": ["methods"], "modalities": ["CT"], "score": 0.9, "evidence": ["120 kVp"]}'
          : '{"labels": ["other"], "modalities": [], "score": 0.1, "evidence": []}',
      extraction: () => ALL_CANDIDATES,
      adjudication: ALL_WINNERS,
    });
    const { loop } = buildLoop(client);

    const result = await loop.run('job-2');

    expect(result.stop_reason).toBe('gaps_resolved');
    expect(temp.store.getSeedPages('job-2').map((s) => s.page)).toEqual([1]);
    const triageDone = temp.store.listTransitions('job-2').find((t) => t.step === 'triage.done');
    expect(triageDone?.update.pages).toEqual([1]);
    expect(client.extractionCalls()).toBe(1);
  });

  it('records an error status and rethrows when an action fails', async () => {
    const jobId = createJob(4, [1]);
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const { loop, actions } = buildLoop(client);
    vi.spyOn(actions, 'extractWithWindow').mockRejectedValue(new Error('disk full'));

    await expect(loop.run(jobId)).rejects.toThrow('disk full');

    expect(temp.store.getStatus(jobId)).toMatchObject({
      state: 'error',
      step: 'agent.error',
      stop_reason: 'exception',
      steps_used: 1,
      error: 'disk full',
    });
  });

  it('rejects an unknown job', async () => {
    const { loop } = buildLoop(routedClient({}));
    await expect(loop.run('nope')).rejects.toBeInstanceOf(JobStoreError);
  });
});

describe('LoopActions', () => {
  let temp: TempStore;

  beforeEach(() => {
    temp = openTempStore('protocol-loop-');
    temp.store.createJob({
      id: 'job-a',
      domain: 'ct',
      pages: ['p0', 'p1', 'p2', 'p3'].map((text, index) => ({ index, text })),
      seedPages: [1],
    });
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('reports no improvement for a widen pass with no earlier gap report', async () => {
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const actions = new LoopActions(temp.store, new ProtocolPipeline(temp.store, client), 4);

    const result = await actions.extractWithWindow('job-a', 1);

    expect(result.before).toBeNull();
    expect(result.improved).toBe(false);
    expect(result.pages).toEqual([0, 1, 2]);
    expect(temp.store.getStatus('job-a')?.gaps_before).toBeUndefined();
  });

  it('clamps the requested span to the ceiling', async () => {
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const actions = new LoopActions(temp.store, new ProtocolPipeline(temp.store, client), 2);

    const result = await actions.extractWithWindow('job-a', 9);

    expect(result.span).toBe(2);
    expect(result.pages).toEqual([0, 1, 2, 3]);
  });

  it('summarizes the baseline gaps', async () => {
    const client = routedClient({ extraction: () => NO_CANDIDATES });
    const actions = new LoopActions(temp.store, new ProtocolPipeline(temp.store, client), 4);

    const result = await actions.extractBaseline('job-a');

    expect(result.seed_pages).toEqual([1]);
    expect(result.candidate_count).toBe(0);
    expect(result.summary).toBe('GAPS missing=7 conflicts=0 ambiguous=0');
    expect(temp.store.getStatus('job-a')).toMatchObject({
      state: 'baseline_extract',
      step: 'extract.done',
      last_action: 'extract_baseline',
    });
  });
});
