import { z } from 'zod';
import { RESOURCE_TYPES, REFERENCE_TYPES, OUTPUT_FORMATS, WARNING_KINDS } from './constants.js';
import { InvalidArgumentError } from './errors.js';

// ─── Reusable primitives ───────────────────────────────────────────────────

export const ResourceTypeSchema = z.enum(RESOURCE_TYPES);
export const ReferenceTypeSchema = z.enum(REFERENCE_TYPES);
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);
export const WarningKindSchema = z.enum(WARNING_KINDS);

// ─── Catalog document (scan --format json) ─────────────────────────────────

export const ComponentEntrySchema = z.object({
  name: z.string().min(1),
  notation: z.string().min(1),
  path: z.string().min(1),
  skill: z.string().optional(),
  description: z.string().optional(),
});

export const BundleEntrySchema = z.object({
  path: z.string().min(1),
  scope: z.enum(['primary', 'secondary']).default('primary'),
  skills: z.array(ComponentEntrySchema).default([]),
  commands: z.array(ComponentEntrySchema).default([]),
  agents: z.array(ComponentEntrySchema).default([]),
  scripts: z.array(ComponentEntrySchema).default([]),
  tests: z.array(ComponentEntrySchema).default([]),
  files: z.array(z.string()).default([]),
});

export const ScanWarningSchema = z.object({
  kind: WarningKindSchema,
  path: z.string(),
  message: z.string(),
});

export const CatalogDocumentSchema = z.object({
  status: z.literal('success').optional(),
  version: z.string(),
  roots: z.array(z.string()),
  bundles: z.record(BundleEntrySchema),
  warnings: z.array(ScanWarningSchema).default([]),
});

export type ComponentEntry = z.infer<typeof ComponentEntrySchema>;
export type BundleEntry = z.infer<typeof BundleEntrySchema>;
export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;

// ─── Validation helpers ────────────────────────────────────────────────────

export function parseCatalogDocument(data: unknown): CatalogDocument {
  const result = CatalogDocumentSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new InvalidArgumentError(`Invalid catalog document at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}
