/**
 * Tool Input Validation Schemas
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DomainSelection = z.enum(['ct', 'mri', 'auto']);

export const ArtifactName = z.enum(['seed_pages', 'candidates', 'winners', 'gap_report', 'doc_flags']);

export const JobId = z
  .string()
  .min(1, 'Job ID is required')
  .max(128, 'Job ID must be 128 characters or less')
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'Job ID may contain only letters, digits, "_", "." and "-"');

const PageIndex = z.number().int().min(0, 'Page index must be zero or greater');

const PageInput = z.object({
  index: PageIndex,
  text: z.string(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// JOB SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Pages may be given as plain strings (indexed by position) or as
 * {index, text} objects.
 */
export const JobCreateInput = z.object({
  job_id: JobId.optional(),
  title: z.string().max(500).optional(),
  domain: DomainSelection.optional(),
  pages: z
    .union([z.array(z.string()), z.array(PageInput)])
    .transform((pages: Array<string | z.infer<typeof PageInput>>) =>
      pages.map((p, i) => (typeof p === 'string' ? { index: i, text: p } : { index: p.index, text: p.text }))
    )
    .refine((pages) => pages.length > 0, 'At least one page is required')
    .refine(
      (pages) => new Set(pages.map((p) => p.index)).size === pages.length,
      'Page indices must be unique'
    ),
  seed_pages: z.array(PageIndex).optional(),
});

export const JobListInput = z.object({
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

export const JobRefInput = z.object({
  job_id: JobId,
});

export const StatusInput = z.object({
  job_id: JobId,
  include_history: z.boolean().default(true),
  history_limit: z.number().int().min(1).max(1000).default(200),
});

export const ArtifactsInput = z.object({
  job_id: JobId,
  include: z.array(ArtifactName).min(1).default(['winners', 'gap_report', 'doc_flags']),
  candidate_limit: z.number().int().min(1).max(5000).default(200),
  candidate_offset: z.number().int().min(0).default(0),
});

export const ExportInput = z.object({
  job_id: JobId,
  output_dir: z.string().min(1, 'Output directory is required'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const TriageInput = z.object({
  job_id: JobId,
  top_k: z.number().int().min(1).max(50).default(6),
  skip_preflight: z.boolean().default(false),
});

export const ExtractWindowInput = z.object({
  job_id: JobId,
  span: z.number().int().min(0).max(10).default(2),
});
