/**
 * Scripted capability replies for control-loop tests
 *
 * Routes each call by its system instructions so one client can serve
 * preflight, triage, extraction and adjudication.
 */

import {
  IMAGING_VERDICT_SYSTEM,
  PAGE_TRIAGE_SYSTEM,
  TITLE_SYSTEM,
} from '../../../src/services/protocol/prompts.js';
import { fakeClient, type FakeClient } from '../helpers.js';

/** One explicit value for every required CT field */
export const CT_FINDINGS = [
  { field: 'slice_thickness_mm', value: 1, units: 'mm', evidence: 'slice thickness 1 mm' },
  { field: 'kernel', value: 'B30f', units: '', evidence: 'reconstruction kernel B30f' },
  { field: 'kVp', value: 120, units: 'kVp', evidence: 'tube voltage 120 kVp' },
  { field: 'mAs', value: 150, units: 'mAs', evidence: 'tube current 150 mAs' },
  { field: 'voxel_size_mm', value: [0.7, 0.7, 1], units: 'mm', evidence: 'voxel size 0.7x0.7x1 mm' },
  { field: 'matrix', value: [512, 512], units: '', evidence: 'matrix 512x512' },
  { field: 'fov_mm', value: 350, units: 'mm', evidence: 'FOV 350 mm' },
];

export const NO_CANDIDATES = JSON.stringify({ candidates: [] });

export const ALL_CANDIDATES = JSON.stringify({
  candidates: CT_FINDINGS.map((f) => ({
    field: f.field,
    raw_span: f.evidence,
    value: f.value,
    units: f.units,
    evidence: f.evidence,
    confidence: 0.9,
  })),
});

export const ALL_WINNERS = JSON.stringify({
  fields: Object.fromEntries(
    CT_FINDINGS.map((f) => [
      f.field,
      { value: f.value, units: f.units, page: 1, evidence: f.evidence, confidence: 0.9, reason: 'explicit' },
    ])
  ),
});

export interface RouteReplies {
  /** Reply to the n-th extraction call (zero-based) */
  extraction?: (call: number) => string;
  adjudication?: string;
  verdict?: string;
  title?: string;
  /** Reply to a page-triage call, given the page prompt */
  triage?: (userInstructions: string) => string;
}

export interface RoutedClient extends FakeClient {
  extractionCalls(): number;
}

export function routedClient(replies: RouteReplies): RoutedClient {
  let extraction = 0;
  const client = fakeClient(async (system, user) => {
    if (system === IMAGING_VERDICT_SYSTEM) return replies.verdict ?? '{"is_imaging": true, "modalities": ["CT"]}';
    if (system === TITLE_SYSTEM) return replies.title ?? '{"title": "", "confidence": 0}';
    if (system === PAGE_TRIAGE_SYSTEM) {
      return replies.triage ? replies.triage(user) : '{"labels": ["other"], "modalities": [], "score": 0}';
    }
    if (system.startsWith('You extract')) {
      const n = extraction++;
      return replies.extraction ? replies.extraction(n) : NO_CANDIDATES;
    }
    if (system.startsWith('You adjudicate')) return replies.adjudication ?? '{"fields": {}}';
    throw new Error(`unexpected instructions: ${system.slice(0, 40)}`);
  });
  return Object.assign(client, { extractionCalls: () => extraction });
}
