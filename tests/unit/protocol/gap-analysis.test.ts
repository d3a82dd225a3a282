/**
 * Unit tests for rule-based gap analysis
 */

import { describe, it, expect } from 'vitest';

import type { GroupedRepresentatives, Winner, WinnerSet } from '../../../src/models/protocol.js';
import { CT_PROFILE, MRI_PROFILE, getFieldSpec, type FieldSpec } from '../../../src/services/protocol/domains.js';
import {
  analyzeGaps,
  classifyField,
  exceedsTolerance,
  openGapCount,
  relativeDifference,
} from '../../../src/services/protocol/gap-analysis.js';
import { representative } from '../helpers.js';

const NOW = () => new Date('2026-01-15T10:00:00.000Z');

function spec(name: string, profile = CT_PROFILE): FieldSpec {
  const found = getFieldSpec(profile, name);
  if (!found) throw new Error(`no field ${name}`);
  return found;
}

function winner(field: string, value: Winner['value'], confidence = 0.9): Winner {
  return { field, value, units: '', page: 1, evidence: `${field} evidence`, confidence, reason: '' };
}

function winnerSet(profile: typeof CT_PROFILE, winners: Winner[]): WinnerSet {
  return {
    schema_version: 1,
    domain: profile.id,
    fields: Object.fromEntries(winners.map((w) => [w.field, w])),
  };
}

/** Winners for every required CT field */
function allCtWinners(): Winner[] {
  return [
    winner('slice_thickness_mm', 1),
    winner('kernel', 'B30f'),
    winner('kVp', 120),
    winner('mAs', 150),
    winner('voxel_size_mm', [0.7, 0.7, 1]),
    winner('matrix', [512, 512]),
    winner('fov_mm', 350),
  ];
}

describe('relativeDifference', () => {
  it('divides by the larger magnitude', () => {
    expect(relativeDifference(1, 2.5)).toBeCloseTo(0.6, 9);
    expect(relativeDifference(0, 0)).toBe(0);
  });
});

describe('exceedsTolerance', () => {
  it('applies absolute or relative thresholds for slice thickness', () => {
    const thickness = spec('slice_thickness_mm');
    expect(exceedsTolerance(thickness, 1.0, 2.5)).toBe(true);
    expect(exceedsTolerance(thickness, 1.0, 1.4)).toBe(true);
    expect(exceedsTolerance(thickness, 1.0, 1.1)).toBe(false);
  });

  it('conflicts on any difference for integers, pairs and categories', () => {
    expect(exceedsTolerance(spec('kVp'), 120, 100)).toBe(true);
    expect(exceedsTolerance(spec('matrix'), [512, 512], [512, 256])).toBe(true);
    expect(exceedsTolerance(spec('matrix'), [512, 512], [512, 512])).toBe(false);
    expect(exceedsTolerance(spec('kernel'), 'B30f', 'b30F')).toBe(false);
    expect(exceedsTolerance(spec('kernel'), 'B30f', 'B45f')).toBe(true);
  });

  it('checks voxel sizes per axis', () => {
    const voxel = spec('voxel_size_mm');
    expect(exceedsTolerance(voxel, [1, 1, 1], [1, 1, 1.15])).toBe(false);
    expect(exceedsTolerance(voxel, [1, 1, 1], [1, 1, 3])).toBe(true);
  });
});

describe('classifyField', () => {
  it('calls 1.0 mm (0.72) vs 2.5 mm (0.74) a conflict, not an ambiguity', () => {
    const reps = [
      representative({ normalized_value: 2.5, value: 2.5, confidence: 0.74, page: 5 }),
      representative({ normalized_value: 1.0, value: 1.0, confidence: 0.72, page: 3 }),
    ];
    const result = classifyField(CT_PROFILE, spec('slice_thickness_mm'), reps);
    expect(result.kind).toBe('conflict');
    if (result.kind === 'conflict') {
      expect(result.entry.a.value).toBe(2.5);
      expect(result.entry.b.value).toBe(1);
      expect(result.entry.reason).toBe('2.5 mm vs 1 mm exceeds the slice thickness tolerance');
    }
  });

  it('calls two different kernels with similar high confidence ambiguous', () => {
    const reps = [
      representative({ normalized_value: 'B30f', confidence: 0.8 }),
      representative({ normalized_value: 'B45f', confidence: 0.75 }),
    ];
    const result = classifyField(CT_PROFILE, spec('kernel'), reps);
    expect(result).toMatchObject({
      kind: 'ambiguous',
      entry: { field: 'kernel', reason: 'two distinct values with similar confidence (Δ=0.05)' },
    });
  });

  it('calls close numeric values with similar high confidence ambiguous', () => {
    const reps = [
      representative({ normalized_value: 250, confidence: 0.7 }),
      representative({ normalized_value: 240, confidence: 0.68 }),
    ];
    expect(classifyField(CT_PROFILE, spec('fov_mm'), reps)).toMatchObject({
      kind: 'ambiguous',
      entry: { reason: 'close values with similar confidence (Δ=0.02)' },
    });
  });

  it('leaves values within tolerance alone', () => {
    const reps = [
      representative({ normalized_value: 250, confidence: 0.9 }),
      representative({ normalized_value: 245, confidence: 0.6 }),
    ];
    expect(classifyField(CT_PROFILE, spec('fov_mm'), reps)).toEqual({ kind: 'none' });
  });

  it('reports a conflict whatever the runner-up confidence', () => {
    const reps = [
      representative({ normalized_value: 1, confidence: 0.9, page: 2 }),
      representative({ normalized_value: 5, confidence: 0.45, page: 4 }),
    ];
    expect(classifyField(CT_PROFILE, spec('slice_thickness_mm'), reps)).toMatchObject({
      kind: 'conflict',
      entry: {
        field: 'slice_thickness_mm',
        a: { value: 1, page: 2, confidence: 0.9 },
        b: { value: 5, page: 4, confidence: 0.45 },
        reason: '1 mm vs 5 mm exceeds the slice thickness tolerance',
      },
    });
  });

  it('needs two representatives', () => {
    expect(classifyField(CT_PROFILE, spec('kVp'), [representative({ normalized_value: 120 })])).toEqual({
      kind: 'none',
    });
  });
});

describe('analyzeGaps', () => {
  it('produces the stub report with zero candidates and winners', () => {
    const report = analyzeGaps(CT_PROFILE, winnerSet(CT_PROFILE, []), {}, { now: NOW });

    expect(report.policy).toBe('rule_gap_v1_stub');
    expect(report.missing).toEqual([
      'slice_thickness_mm',
      'kernel',
      'kVp',
      'mAs',
      'voxel_size_mm',
      'matrix',
      'fov_mm',
    ]);
    expect(report.ambiguous).toEqual([]);
    expect(report.conflicts).toEqual([]);
    expect(report.missing_low_conf).toEqual([]);
    expect(report.summary).toEqual({ missing: 7, missing_low_conf: 0, ambiguous: 0, conflicts: 0, questions: 3 });
    expect(report.questions.map((q) => q.question)).toEqual([
      'What slice thickness was used for the acquisition?',
      'What reconstruction kernel was used for the acquisition?',
      'What tube potential (kVp) was used for the acquisition?',
    ]);
    expect(report.questions[0]).toMatchObject({ rationale: 'not found in the text', evidence_pages: [] });
    expect(report.provenance).toEqual({
      from_winners: false,
      from_candidates: false,
      winner_count: 0,
      candidate_count: 0,
      generated_at: '2026-01-15T10:00:00.000Z',
    });
  });

  it('reports nothing when every required field has a confident winner', () => {
    const report = analyzeGaps(CT_PROFILE, winnerSet(CT_PROFILE, allCtWinners()), {}, { candidateCount: 9, now: NOW });
    expect(report.policy).toBe('rule_gap_v1');
    expect(report.summary).toEqual({ missing: 0, missing_low_conf: 0, ambiguous: 0, conflicts: 0, questions: 0 });
    expect(openGapCount(report)).toBe(0);
  });

  it('flags low-confidence winners and asks to confirm them', () => {
    const winners = allCtWinners().map((w) => (w.field === 'kVp' ? { ...w, confidence: 0.4 } : w));
    const report = analyzeGaps(CT_PROFILE, winnerSet(CT_PROFILE, winners), {}, { candidateCount: 7 });

    expect(report.missing_low_conf).toEqual(['kVp']);
    expect(report.questions).toEqual([
      {
        field: 'kVp',
        question: 'Can you confirm the tube potential (kVp) of 120 kVp?',
        rationale: 'adjudicated with confidence 0.40',
        evidence_pages: [1],
      },
    ]);
    expect(openGapCount(report)).toBe(0);
  });

  it('records the slice thickness conflict with a question', () => {
    const grouped: GroupedRepresentatives = {
      slice_thickness_mm: [
        representative({ normalized_value: 2.5, value: 2.5, confidence: 0.74, page: 5 }),
        representative({ normalized_value: 1.0, value: 1.0, confidence: 0.72, page: 3 }),
      ],
    };
    const report = analyzeGaps(CT_PROFILE, winnerSet(CT_PROFILE, allCtWinners()), grouped, { candidateCount: 2 });

    expect(report.summary.conflicts).toBe(1);
    expect(report.summary.ambiguous).toBe(0);
    expect(report.conflicts[0].field).toBe('slice_thickness_mm');
    expect(report.questions).toEqual([
      {
        field: 'slice_thickness_mm',
        question:
          'The document reports slice thickness as both 2.5 mm and 1 mm. Which value applies to the analyzed scans?',
        rationale: '2.5 mm vs 1 mm exceeds the slice thickness tolerance',
        evidence_pages: [3, 5],
      },
    ]);
    expect(openGapCount(report)).toBe(1);
  });

  it('asks about required fields before optional ones and one question per field', () => {
    const winners = allCtWinners().filter((w) => w.field !== 'fov_mm');
    const grouped: GroupedRepresentatives = {
      kernel_family: [
        representative({ normalized_value: 'bone', confidence: 0.8 }),
        representative({ normalized_value: 'lung', confidence: 0.78 }),
      ],
      fov_mm: [
        representative({ normalized_value: 350, confidence: 0.7, page: 2 }),
        representative({ normalized_value: 150, confidence: 0.6, page: 4 }),
      ],
    };
    const report = analyzeGaps(CT_PROFILE, winnerSet(CT_PROFILE, winners), grouped, { candidateCount: 4 });

    expect(report.missing).toEqual(['fov_mm']);
    expect(report.conflicts.map((c) => c.field)).toEqual(['fov_mm']);
    expect(report.ambiguous.map((a) => a.field)).toEqual(['kernel_family']);
    expect(report.questions.map((q) => q.field)).toEqual(['fov_mm', 'kernel_family']);
    expect(report.questions[0].question).toBe('What field of view was used for the acquisition?');
    expect(report.questions[0].rationale).toBe('no candidate passed adjudication');
    expect(report.summary.questions).toBe(report.questions.length);
  });

  it('keeps summary counts equal to the array lengths', () => {
    const grouped: GroupedRepresentatives = {
      tr_ms: [
        representative({ normalized_value: 2000, confidence: 0.9 }),
        representative({ normalized_value: 3000, confidence: 0.8 }),
      ],
    };
    const report = analyzeGaps(MRI_PROFILE, winnerSet(MRI_PROFILE, []), grouped, { candidateCount: 2 });

    expect(report.policy).toBe('rule_gap_v1');
    expect(report.summary.missing).toBe(report.missing.length);
    expect(report.summary.conflicts).toBe(report.conflicts.length);
    expect(report.summary.ambiguous).toBe(report.ambiguous.length);
    expect(report.summary.questions).toBeLessThanOrEqual(3);
    expect(report.missing).toContain('tr_ms');
    expect(report.conflicts.map((c) => c.field)).toEqual(['tr_ms']);
  });
});
