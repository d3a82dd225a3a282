/**
 * Normalization & Grouping
 *
 * normalize() converts a raw candidate value to the field's canonical form
 * (unit conversion, shape coercion, type coercion) or returns null when that
 * is impossible. groupKey() turns a normalized value into a cluster key, and
 * groupRepresentatives() keeps the strongest candidate per cluster.
 *
 * @module services/protocol/normalization
 */

import type {
  Candidate,
  CandidateValue,
  GroupedRepresentatives,
  NormalizedValue,
  Representative,
} from '../../models/protocol.js';
import { getFieldSpec, type CanonicalUnit, type DomainProfile, type FieldSpec } from './domains.js';

export const DEFAULT_PER_FIELD_LIMIT = 5;

// ═══════════════════════════════════════════════════════════════════════════════
// UNITS
// ═══════════════════════════════════════════════════════════════════════════════

interface UnitAlias {
  unit: Exclude<CanonicalUnit, ''>;
  factor: number;
}

/** Lower-cased unit spelling -> canonical unit and multiplier */
const UNIT_ALIASES: Record<string, UnitAlias> = {
  mm: { unit: 'mm', factor: 1 },
  millimeter: { unit: 'mm', factor: 1 },
  millimeters: { unit: 'mm', factor: 1 },
  millimetre: { unit: 'mm', factor: 1 },
  millimetres: { unit: 'mm', factor: 1 },
  cm: { unit: 'mm', factor: 10 },
  centimeter: { unit: 'mm', factor: 10 },
  centimeters: { unit: 'mm', factor: 10 },
  centimetre: { unit: 'mm', factor: 10 },
  centimetres: { unit: 'mm', factor: 10 },
  m: { unit: 'mm', factor: 1000 },
  µm: { unit: 'mm', factor: 0.001 },
  μm: { unit: 'mm', factor: 0.001 },
  um: { unit: 'mm', factor: 0.001 },
  micrometer: { unit: 'mm', factor: 0.001 },
  micrometers: { unit: 'mm', factor: 0.001 },
  micron: { unit: 'mm', factor: 0.001 },
  microns: { unit: 'mm', factor: 0.001 },
  ms: { unit: 'ms', factor: 1 },
  msec: { unit: 'ms', factor: 1 },
  millisecond: { unit: 'ms', factor: 1 },
  milliseconds: { unit: 'ms', factor: 1 },
  s: { unit: 'ms', factor: 1000 },
  sec: { unit: 'ms', factor: 1000 },
  second: { unit: 'ms', factor: 1000 },
  seconds: { unit: 'ms', factor: 1000 },
  µs: { unit: 'ms', factor: 0.001 },
  μs: { unit: 'ms', factor: 0.001 },
  us: { unit: 'ms', factor: 0.001 },
  t: { unit: 'T', factor: 1 },
  tesla: { unit: 'T', factor: 1 },
  mt: { unit: 'T', factor: 0.001 },
  deg: { unit: 'deg', factor: 1 },
  degree: { unit: 'deg', factor: 1 },
  degrees: { unit: 'deg', factor: 1 },
  '°': { unit: 'deg', factor: 1 },
  rad: { unit: 'deg', factor: 180 / Math.PI },
  kvp: { unit: 'kVp', factor: 1 },
  kv: { unit: 'kVp', factor: 1 },
  mas: { unit: 'mAs', factor: 1 },
};

/**
 * Strip decorations that never change the scale: cubes/squares on lengths
 * ("mm³", "mm^3") and surrounding punctuation.
 */
function cleanUnit(units: string): string {
  return units
    .trim()
    .toLowerCase()
    .replace(/[³²]|\^\s*[23]/g, '')
    .replace(/^[([]+|[)\].,;:]+$/g, '')
    .trim();
}

/**
 * Convert a scalar to the canonical unit.
 * Unknown or empty units are taken as already canonical; a known unit of a
 * different dimension makes the value unusable (null).
 */
export function convertUnit(value: number, units: string, canonical: CanonicalUnit): number | null {
  if (!canonical) return value;
  const alias = UNIT_ALIASES[cleanUnit(units)];
  if (!alias) return value;
  if (alias.unit !== canonical) return null;
  return value * alias.factor;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const NUMBER_PREFIX = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?)\s*(.*)$/i;
/** An x, × or * between two numbers, each optionally followed by a unit ("0.5 mm x 0.5 mm") */
const DIMENSION_SEPARATOR = /(?<=\d\s*[a-zµμ]*)\s*[x×*]\s*(?=[-+]?\.?\d)/i;

interface Quantity {
  value: number;
  unit: string;
}

/**
 * "1.25 mm" -> { value: 1.25, unit: "mm" }; "abc" -> null.
 * The unit is the first token after the number; trailing words are ignored.
 */
function parseQuantity(raw: string): Quantity | null {
  const match = NUMBER_PREFIX.exec(raw);
  if (!match) return null;
  const value = Number(match[1]);
  if (!Number.isFinite(value)) return null;
  const [unit = ''] = match[2].trim().split(/\s+/);
  return { value, unit };
}

function toFiniteNumber(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string') return parseQuantity(raw)?.value ?? null;
  return null;
}

/** Scalar with the unit taken from `units`, else from text after the number */
function scalarWithUnit(raw: unknown, units: string): Quantity | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { value: raw, unit: units } : null;
  }
  if (typeof raw === 'string') {
    const q = parseQuantity(raw);
    if (!q) return null;
    return { value: q.value, unit: units.trim() ? units : q.unit };
  }
  return null;
}

/**
 * "1x1x3 mm" -> { parts: ["1","1","3"], unit: "mm" }
 * Returns null when the string has no dimension separator.
 */
function splitDimensions(raw: string): { parts: string[]; unit: string } | null {
  const text = raw.trim();
  if (!DIMENSION_SEPARATOR.test(text)) return null;
  const parts = text.split(DIMENSION_SEPARATOR);
  const last = parts[parts.length - 1];
  const lastQ = parseQuantity(last);
  if (!lastQ) return null;
  parts[parts.length - 1] = String(lastQ.value);
  return { parts, unit: lastQ.unit };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZE
// ═══════════════════════════════════════════════════════════════════════════════

function normalizeNumber(spec: FieldSpec, raw: unknown, units: string): number | null {
  const q = scalarWithUnit(raw, units);
  if (!q) return null;
  return convertUnit(q.value, q.unit, spec.unit);
}

function normalizeInteger(spec: FieldSpec, raw: unknown, units: string): number | null {
  const v = normalizeNumber(spec, raw, units);
  return v === null ? null : Math.trunc(v);
}

function normalizeVector3(spec: FieldSpec, raw: unknown, units: string): number[] | null {
  let components: unknown[];
  let unit = units;

  if (Array.isArray(raw)) {
    components = raw;
  } else if (typeof raw === 'string') {
    const dims = splitDimensions(raw);
    if (dims) {
      components = dims.parts;
      if (!unit.trim()) unit = dims.unit;
    } else {
      // "1 mm isotropic" and plain scalars replicate
      const q = scalarWithUnit(raw.replace(/\bisotropic\b/i, ''), units);
      if (!q) return null;
      components = [q.value];
      unit = q.unit;
    }
  } else if (typeof raw === 'number') {
    components = [raw];
  } else {
    return null;
  }

  const values: number[] = [];
  for (const c of components) {
    const n = toFiniteNumber(c);
    if (n === null) return null;
    const converted = convertUnit(n, unit, spec.unit);
    if (converted === null) return null;
    values.push(converted);
  }

  if (values.length === 1) return [values[0], values[0], values[0]];
  // in-plane only: repeat the last component for comparison
  if (values.length === 2) return [values[0], values[1], values[1]];
  if (values.length === 3) return values;
  return null;
}

function normalizePair(raw: unknown): number[] | null {
  let components: unknown[];
  if (Array.isArray(raw)) {
    components = raw;
  } else if (typeof raw === 'string') {
    const dims = splitDimensions(raw);
    if (!dims) return null;
    components = dims.parts;
  } else {
    return null;
  }
  if (components.length !== 2) return null;

  const out: number[] = [];
  for (const c of components) {
    const n = toFiniteNumber(c);
    if (n === null) return null;
    out.push(Math.trunc(n));
  }
  return out;
}

function normalizeCategory(raw: unknown): string | null {
  if (typeof raw === 'string') {
    const s = raw.trim();
    return s ? s : null;
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  return null;
}

/**
 * Canonical form of `raw` for the field, or null when coercion is impossible.
 */
export function normalize(spec: FieldSpec, raw: unknown, units: string): NormalizedValue | null {
  switch (spec.kind) {
    case 'number':
      return normalizeNumber(spec, raw, units);
    case 'integer':
      return normalizeInteger(spec, raw, units);
    case 'vector3':
      return normalizeVector3(spec, raw, units);
    case 'pair':
      return normalizePair(raw);
    case 'category':
      return normalizeCategory(raw);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GROUPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Cluster key for a normalized value: numbers rounded to 3 decimals, vectors
 * as a tuple of rounded components, strings lower-cased and trimmed.
 */
export function groupKey(spec: FieldSpec, value: NormalizedValue): string {
  if (Array.isArray(value)) {
    return `(${value.map((v) => (spec.kind === 'pair' ? Math.trunc(v) : round3(v))).join(',')})`;
  }
  if (typeof value === 'number') {
    return String(spec.kind === 'integer' ? Math.trunc(value) : round3(value));
  }
  return value.trim().toLowerCase();
}

/**
 * Per field, one representative per distinct group key: the member with the
 * highest confidence, ties going to the first seen. Each field's list is
 * sorted by descending confidence and capped at `perFieldLimit`. Fields are
 * keyed in catalog order; fields with no usable candidate are absent.
 */
export function groupRepresentatives(
  candidates: readonly Candidate[],
  profile: DomainProfile,
  perFieldLimit: number = DEFAULT_PER_FIELD_LIMIT
): GroupedRepresentatives {
  const clusters = new Map<string, Map<string, Representative>>();

  for (const c of candidates) {
    const spec = getFieldSpec(profile, c.field);
    if (!spec) continue;
    const normalized = normalize(spec, c.value, c.units);
    if (normalized === null) continue;

    const key = groupKey(spec, normalized);
    let byKey = clusters.get(spec.name);
    if (!byKey) {
      byKey = new Map();
      clusters.set(spec.name, byKey);
    }

    const prev = byKey.get(key);
    if (!prev || c.confidence > prev.confidence) {
      byKey.set(key, toRepresentative(c, normalized));
    }
  }

  const out: GroupedRepresentatives = {};
  for (const spec of profile.fields) {
    const byKey = clusters.get(spec.name);
    if (!byKey || byKey.size === 0) continue;
    // Array.prototype.sort is stable: equal confidences keep first-seen order
    out[spec.name] = [...byKey.values()]
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, Math.max(0, perFieldLimit));
  }
  return out;
}

function toRepresentative(c: Candidate, normalized: NormalizedValue): Representative {
  return {
    value: c.value,
    normalized_value: normalized,
    page: c.page,
    confidence: c.confidence,
    evidence: c.evidence.slice(0, 200),
    units: c.units,
  };
}

/** Render a value for prompts and questions: vectors as "1×1×3" */
export function formatValue(value: NormalizedValue | CandidateValue, unit: string = ''): string {
  const body = Array.isArray(value) ? value.join('×') : String(value);
  return unit ? `${body} ${unit}` : body;
}
