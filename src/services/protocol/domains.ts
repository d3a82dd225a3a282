/**
 * Domain Profiles for Imaging Protocol Extraction
 *
 * A profile fixes the field catalog, canonical units, conflict tolerances and
 * acceptance policy for one modality. Gap classification is rule-based and
 * reads every threshold from here; nothing is discovered at runtime.
 *
 * @module services/protocol/domains
 */

import type { DomainSelection } from '../../models/protocol.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type DomainId = 'ct' | 'mri';

/**
 * number   - float scalar
 * integer  - truncated integer scalar
 * vector3  - [x, y, z]; a scalar is replicated (isotropic)
 * pair     - [w, h] integers; "AxB" strings are parsed
 * category - trimmed string, compared case-insensitively
 */
export type FieldKind = 'number' | 'integer' | 'vector3' | 'pair' | 'category';

export type CanonicalUnit = 'mm' | 'ms' | 'T' | 'deg' | 'kVp' | 'mAs' | '';

/**
 * Two values conflict when |a-b| >= absolute OR relDiff >= relative.
 * With perAxis (vector3) the relative test is applied per component and must
 * be strictly exceeded.
 */
export interface ConflictTolerance {
  absolute?: number;
  relative?: number;
  perAxis?: boolean;
}

export interface FieldSpec {
  name: string;
  label: string;
  kind: FieldKind;
  unit: CanonicalUnit;
  required: boolean;
  /** Prompt line describing what to extract, with examples */
  hint: string;
  /** Undefined for integer/pair/category: any difference conflicts */
  conflict?: ConflictTolerance;
  /** Evidence rejected at adjudication, e.g. FOV statements offered as resolution */
  rejectEvidence?: RegExp;
  /** Unless this also matches */
  rejectUnless?: RegExp;
}

export interface GapThresholds {
  /** Winner confidence below this is missing_low_conf */
  lowConfidence: number;
  /** Both representatives must reach this to be ambiguous */
  ambiguityFloor: number;
  /** Max confidence delta for ambiguity */
  ambiguityDelta: number;
  /** Max relative difference for two numeric values to count as close */
  closeRelative: number;
  /** Adjudicated winners below this are dropped */
  acceptance: number;
}

export interface DomainProfile {
  id: DomainId;
  modality: string;
  fields: FieldSpec[];
  thresholds: GapThresholds;
  /** Evidence phrased as an example or a recommendation is never accepted */
  hedging: RegExp;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED FIELD DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

const FOV_STATEMENT = /\b(fov|field[\s-]of[\s-]view)\b/i;
const RESOLUTION_TERMS = /\b(voxel|resolution|thickness|slice|isotropic)\b/i;

const SLICE_THICKNESS: FieldSpec = {
  name: 'slice_thickness_mm',
  label: 'slice thickness',
  kind: 'number',
  unit: 'mm',
  required: true,
  hint: 'slice_thickness_mm (mm, number) - e.g., "slice thickness 1.25 mm", "0.5 cm" -> 5.0',
  conflict: { absolute: 0.5, relative: 0.2 },
  rejectEvidence: FOV_STATEMENT,
  rejectUnless: RESOLUTION_TERMS,
};

const VOXEL_SIZE: FieldSpec = {
  name: 'voxel_size_mm',
  label: 'voxel size',
  kind: 'vector3',
  unit: 'mm',
  required: true,
  hint: 'voxel_size_mm ([x,y,z] floats, mm) - e.g., "1x1x3 mm", "1 mm isotropic" -> [1,1,1]',
  conflict: { relative: 0.2, perAxis: true },
  rejectEvidence: FOV_STATEMENT,
  rejectUnless: RESOLUTION_TERMS,
};

const MATRIX: FieldSpec = {
  name: 'matrix',
  label: 'acquisition matrix',
  kind: 'pair',
  unit: '',
  required: true,
  hint: 'matrix ([w,h] ints) - e.g., "512x512", "matrix 256 x 256"',
};

const FOV: FieldSpec = {
  name: 'fov_mm',
  label: 'field of view',
  kind: 'number',
  unit: 'mm',
  required: true,
  hint: 'fov_mm (mm, number) - e.g., "FOV 25 cm" -> 250',
  conflict: { absolute: 20, relative: 0.1 },
};

const DEFAULT_THRESHOLDS: GapThresholds = {
  lowConfidence: 0.5,
  ambiguityFloor: 0.65,
  ambiguityDelta: 0.1,
  closeRelative: 0.1,
  acceptance: 0.3,
};

const HEDGING =
  /\b(?:e\.g\.?|for example|for instance|such as|typically|usually|recommended|we recommend|may be|might be|could be|by default|default settings?)(?=\W|$)/i;

// ═══════════════════════════════════════════════════════════════════════════════
// PROFILES
// ═══════════════════════════════════════════════════════════════════════════════

export const CT_PROFILE: DomainProfile = {
  id: 'ct',
  modality: 'CT',
  thresholds: DEFAULT_THRESHOLDS,
  hedging: HEDGING,
  fields: [
    SLICE_THICKNESS,
    {
      name: 'kernel',
      label: 'reconstruction kernel',
      kind: 'category',
      unit: '',
      required: true,
      hint: 'kernel (string) - e.g., "B30f", "FC13", "Bone", "Lung", "Standard"',
    },
    {
      name: 'kernel_family',
      label: 'kernel family',
      kind: 'category',
      unit: '',
      required: false,
      hint: 'kernel_family (string) - one of: soft_tissue | bone | lung | standard | detail | smooth | unknown',
    },
    {
      name: 'kVp',
      label: 'tube potential (kVp)',
      kind: 'integer',
      unit: 'kVp',
      required: true,
      hint: 'kVp (int) - e.g., "120 kVp"',
    },
    {
      name: 'mAs',
      label: 'tube current-time product (mAs)',
      kind: 'number',
      unit: 'mAs',
      required: true,
      hint: 'mAs (number) - e.g., "150 mAs", "ref. mAs 200"',
      conflict: { relative: 0.25 },
    },
    VOXEL_SIZE,
    MATRIX,
    FOV,
  ],
};

export const MRI_PROFILE: DomainProfile = {
  id: 'mri',
  modality: 'MRI',
  thresholds: DEFAULT_THRESHOLDS,
  hedging: HEDGING,
  fields: [
    {
      name: 'field_strength_t',
      label: 'magnetic field strength',
      kind: 'number',
      unit: 'T',
      required: true,
      hint: 'field_strength_t (tesla, number) - e.g., "3T scanner", "1.5 T"',
      conflict: { absolute: 0.5 },
    },
    {
      name: 'tr_ms',
      label: 'repetition time (TR)',
      kind: 'number',
      unit: 'ms',
      required: true,
      hint: 'tr_ms (ms, number) - e.g., "TR = 2000 ms", "TR 2.3 s" -> 2300',
      conflict: { relative: 0.2 },
    },
    {
      name: 'te_ms',
      label: 'echo time (TE)',
      kind: 'number',
      unit: 'ms',
      required: true,
      hint: 'te_ms (ms, number) - e.g., "TE = 30 ms"',
      conflict: { relative: 0.2 },
    },
    {
      name: 'flip_angle_deg',
      label: 'flip angle',
      kind: 'number',
      unit: 'deg',
      required: true,
      hint: 'flip_angle_deg (degrees, number) - e.g., "flip angle 90°", "FA = 9 deg"',
      conflict: { absolute: 5, relative: 0.2 },
    },
    SLICE_THICKNESS,
    VOXEL_SIZE,
    MATRIX,
    { ...FOV, required: false },
    {
      name: 'sequence',
      label: 'pulse sequence',
      kind: 'category',
      unit: '',
      required: false,
      hint: 'sequence (string) - e.g., "MPRAGE", "spin echo EPI", "FLAIR"',
    },
    {
      name: 'ti_ms',
      label: 'inversion time (TI)',
      kind: 'number',
      unit: 'ms',
      required: false,
      hint: 'ti_ms (ms, number) - e.g., "TI = 900 ms"',
      conflict: { relative: 0.2 },
    },
  ],
};

const PROFILES: Record<DomainId, DomainProfile> = {
  ct: CT_PROFILE,
  mri: MRI_PROFILE,
};

// ═══════════════════════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════════════════════

export function getProfile(id: DomainId): DomainProfile {
  return PROFILES[id];
}

export function getFieldSpec(profile: DomainProfile, field: string): FieldSpec | undefined {
  return profile.fields.find((f) => f.name === field);
}

export function requiredFields(profile: DomainProfile): string[] {
  return profile.fields.filter((f) => f.required).map((f) => f.name);
}

/**
 * Resolve the profile for a job. An explicit selection wins; under 'auto' any
 * MR modality from preflight selects MRI, everything else falls back to CT.
 */
export function resolveProfile(selection: DomainSelection, modalities: string[]): DomainProfile {
  if (selection !== 'auto') return PROFILES[selection];
  const isMr = modalities.some((m) => /\bmri?\b|magnetic resonance/i.test(m));
  return isMr ? MRI_PROFILE : CT_PROFILE;
}
