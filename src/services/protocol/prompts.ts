/**
 * Prompts for the text-understanding capability
 *
 * Every prompt demands strict JSON. Field lists are generated from the domain
 * profile so that CT and MRI share one template.
 *
 * @module services/protocol/prompts
 */

import type { GroupedRepresentatives } from '../../models/protocol.js';
import type { DomainProfile } from './domains.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATE EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════════

export function extractionSystemPrompt(profile: DomainProfile): string {
  return (
    `You extract ${profile.modality} acquisition parameters from scientific text. ` +
    'Only emit a value when the text states it explicitly, and anchor every value to an exact substring. ' +
    'Output STRICT JSON only, with no commentary.'
  );
}

export function extractionUserPrompt(profile: DomainProfile, windowText: string, centerPage: number): string {
  const fieldLines = profile.fields.map((f) => `- ${f.hint}`).join('\n');
  const unitList = [...new Set(profile.fields.map((f) => f.unit).filter((u) => u))]
    .map((u) => `'${u}'`)
    .join('|');

  return `TEXT WINDOW (tables, symbols and units may appear):
"""
${windowText}
"""

Center page index (zero-based): ${centerPage}

FIELDS (emit only with explicit textual support):
${fieldLines}

Return exactly:
{
  "candidates": [
    {
      "field": "<one of the fields above>",
      "page": <int page index; the center page unless the evidence is clearly elsewhere>,
      "raw_span": "<short exact substring>",
      "value": <number|string|[number,number,number]|[int,int]>,
      "units": "<${unitList}|''>",
      "evidence": "<exact substring, at most 200 chars>",
      "confidence": <0.0-1.0>,
      "notes": "<optional, short>"
    }
  ]
}

Rules:
- Never guess. No value without a literal supporting substring.
- Convert cm to mm (x10) and um to mm (/1000); convert s to ms (x1000).
- Values given as examples or recommendations are not the protocol used.
- If uncertain, set confidence <= 0.6.
- STRICT JSON only.`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ADJUDICATION
// ═══════════════════════════════════════════════════════════════════════════════

export function adjudicationSystemPrompt(profile: DomainProfile): string {
  return (
    `You adjudicate ${profile.modality} imaging parameters. From several candidate extractions ` +
    'with evidence, choose at most one value per field and justify it briefly. ' +
    'Do not invent values; omit a field when evidence is insufficient. Output STRICT JSON only.'
  );
}

/**
 * Compact listing of representatives, one block per field.
 */
export function formatRepresentatives(profile: DomainProfile, grouped: GroupedRepresentatives): string {
  const lines: string[] = [];
  for (const spec of profile.fields) {
    const reps = grouped[spec.name];
    if (!reps || reps.length === 0) continue;
    lines.push(`${spec.name}:`);
    for (const rep of reps) {
      const evidence = rep.evidence.slice(0, 120).replace(/"/g, "'");
      lines.push(
        `- {value: ${JSON.stringify(rep.normalized_value)}, units: "${spec.unit}", page: ${rep.page}, ` +
          `evidence: "${evidence}", confidence: ${rep.confidence}}`
      );
    }
  }
  return lines.join('\n');
}

export function adjudicationUserPrompt(
  profile: DomainProfile,
  grouped: GroupedRepresentatives,
  modality: string[]
): string {
  const stated = modality.length > 0 ? modality.join(', ') : 'unknown';
  const example = profile.fields
    .map((f) => {
      const shape =
        f.kind === 'vector3'
          ? '[<number>,<number>,<number>]'
          : f.kind === 'pair'
            ? '[<int>,<int>]'
            : f.kind === 'category'
              ? '"<str>"'
              : f.kind === 'integer'
                ? '<int>'
                : '<number>';
      return `    "${f.name}": {"value": ${shape}, "units": "${f.unit}", "page": <int>, "evidence": "<str>", "confidence": <0.0-1.0>, "reason": "<short>"}`;
    })
    .join(',\n');

  return `DOCUMENT MODALITY: ${stated}

CANDIDATES grouped by field (values already in canonical units):
${formatRepresentatives(profile, grouped)}

Return exactly:
{
  "fields": {
${example}
  }
}

Rules:
- At most one entry per field, and its value must be one of the listed candidates.
- Omit a field when no candidate has solid evidence.
- Prefer explicit labels ("slice thickness = ...") and table-like phrasing.
- Reject evidence phrased as an example, a default or a recommendation.
- Never take a field-of-view statement as a voxel size or slice thickness.
- STRICT JSON only.`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PREFLIGHT
// ═══════════════════════════════════════════════════════════════════════════════

export const IMAGING_VERDICT_SYSTEM =
  'You classify whether a scientific paper reports medical imaging methods. Output STRICT JSON only. ' +
  'Favor recall: acquisition parameters, modality names or sequence/reconstruction jargon mean imaging. ' +
  'Classify as non-imaging only when no such cue is present.';

export function imagingVerdictUserPrompt(earlyText: string): string {
  return `Decide whether this paper describes medical imaging methods or reports acquisition details.

EARLY PAGES (truncated):
"""
${earlyText}
"""

Cues: CT (kVp, mAs, pitch, slice thickness, reconstruction kernel, FOV); MRI (TR, TE, TI, flip angle,
field strength such as 1.5T/3T, spin echo, gradient echo, EPI, FLAIR, DWI); PET/SPECT (SUV, MBq, OSEM);
Ultrasound (transducer MHz, Doppler); X-ray/CBCT (kVp, detector, cone-beam).

Return exactly:
{
  "is_imaging": true|false,
  "modalities": ["CT","MRI","PET","SPECT","Ultrasound","X-ray","CBCT"],
  "confidence": 0.0-1.0,
  "reasons": ["concrete cues used (<=3)"],
  "counter_signals": ["why not imaging, if applicable (<=2)"]
}

Rules:
- Ignore mentions found only in affiliations or references.
- Explicit parameters mean confidence >= 0.7; otherwise <= 0.6.
- STRICT JSON only.`;
}

export const TITLE_SYSTEM =
  'You extract the main article title from the noisy front matter of a scientific paper. ' +
  'Never return section headings, running heads, journal names or affiliations. ' +
  'Join words split across lines and keep any subtitle after a colon. Output STRICT JSON only.';

export function titleUserPrompt(earlyText: string): string {
  return `Extract the MAIN ARTICLE TITLE.

TEXT (truncated):
"""
${earlyText}
"""

Return exactly:
{
  "title": "<title as it appears, line breaks removed>",
  "confidence": 0.0-1.0,
  "reasons": ["<=2 short reasons"]
}

Rules:
- Section labels (Abstract, Introduction, Methods) and publisher banners are never the title.
- Prefer the heading right before the abstract, 6-25 words long.
- If uncertain, set confidence <= 0.6.
- STRICT JSON only.`;
}

export const PAGE_TRIAGE_SYSTEM = 'You are a precise scientific text classifier. Output STRICT JSON only.';

export function pageTriageUserPrompt(pageText: string): string {
  return `Decide whether this page contains imaging acquisition or method details, and list modalities.

TEXT:
"""
${pageText}
"""

Return exactly:
{
  "labels": ["methods","acquisition","preprocessing","table","other"],
  "modalities": ["..."],
  "score": 0.0-1.0,
  "evidence": ["short substrings from the page (<=3)"]
}

Rules:
- Only list modalities the text supports (TR/TE means MRI; kVp/mAs means CT).
- STRICT JSON only.`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLARIFYING QUESTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function missingQuestion(label: string): string {
  return `What ${label} was used for the acquisition?`;
}

export function conflictQuestion(label: string, a: string, b: string): string {
  return `The document reports ${label} as both ${a} and ${b}. Which value applies to the analyzed scans?`;
}

export function ambiguityQuestion(label: string, options: string[]): string {
  return `Which ${label} is correct: ${options.join(' or ')}?`;
}

export function lowConfidenceQuestion(label: string, value: string): string {
  return `Can you confirm the ${label} of ${value}?`;
}
