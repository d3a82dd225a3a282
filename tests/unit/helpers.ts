/**
 * Shared fixtures for unit tests
 *
 * A scripted stand-in for the text-understanding endpoint plus builders for
 * pages, candidates and representatives.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi, type Mock } from 'vitest';

import type { Candidate, Page, Representative } from '../../src/models/protocol.js';
import type { ProposalClient } from '../../src/services/llm/client.js';
import { JobStore } from '../../src/services/storage/job-store/index.js';

export type ProposeFn = (systemInstructions: string, userInstructions: string) => Promise<string>;

export interface FakeClient extends ProposalClient {
  propose: Mock<ProposeFn>;
}

/** A client whose answers come from `impl` */
export function fakeClient(impl: ProposeFn): FakeClient {
  return { propose: vi.fn<ProposeFn>(impl) };
}

/** A client that answers each call with the next queued reply (strings or errors) */
export function queuedClient(replies: Array<string | Error>): FakeClient {
  const queue = [...replies];
  return fakeClient(async () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  });
}

export function makePages(texts: string[]): Page[] {
  return texts.map((text, index) => ({ index, text }));
}

export function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    field: 'slice_thickness_mm',
    page: 0,
    raw_span: '1 mm',
    value: 1,
    units: 'mm',
    evidence: 'slice thickness 1 mm',
    confidence: 0.8,
    notes: '',
    ...overrides,
  };
}

export function representative(overrides: Partial<Representative> = {}): Representative {
  return {
    value: 1,
    normalized_value: 1,
    page: 0,
    confidence: 0.8,
    evidence: 'slice thickness 1 mm',
    units: 'mm',
    ...overrides,
  };
}

export interface TempStore {
  store: JobStore;
  dir: string;
  cleanup(): void;
}

/** A JobStore on a fresh SQLite file in its own temp directory */
export function openTempStore(prefix = 'protocol-store-'): TempStore {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const store = JobStore.open(join(dir, 'jobs.db'));
  return {
    store,
    dir,
    cleanup: () => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
