import { z } from 'zod';

// ============================================================================
// Rate Limit Table
// ============================================================================

export const OriginLimitSchema = z.object({
  concurrency: z.number().int().min(1),
  minIntervalMs: z.number().min(0),
});

/**
 * Keys must be bare origins ("https://i.pximg.net"), since lookups are by
 * exact origin string.
 */
export const RateLimitTableSchema = z.record(OriginLimitSchema).superRefine((table, ctx) => {
  for (const key of Object.keys(table)) {
    if (!isOrigin(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `"${key}" is not an origin (expected scheme://host[:port])`,
      });
    }
  }
});

export function isOrigin(value: string): boolean {
  try {
    return new URL(value).origin === value;
  } catch {
    return false;
  }
}

// ============================================================================
// Download Manifest
// ============================================================================

const HeadersSchema = z.record(z.string());

const HttpUrlSchema = z.string().url().refine(
  (value) => value.startsWith('http://') || value.startsWith('https://'),
  { message: 'Only http and https URLs can be downloaded' }
);

export const ManifestEntrySchema = z.object({
  url: HttpUrlSchema,
  filename: z.string().min(1).refine(
    (value) => !value.split(/[\\/]/).includes('..'),
    { message: 'Filename must not leave the batch directory' }
  ).optional(),
  headers: HeadersSchema.optional(),
});

export const ManifestBatchSchema = z.object({
  tag: z.string().min(1),
  subDirectory: z.string().default(''),
  headers: HeadersSchema.optional(),
  entries: z.array(ManifestEntrySchema),
});

export const ManifestSchema = z.object({
  batches: z.array(ManifestBatchSchema).min(1),
});

export type OriginLimitInput = z.infer<typeof OriginLimitSchema>;
export type ManifestEntryInput = z.infer<typeof ManifestEntrySchema>;
export type ManifestBatchInput = z.infer<typeof ManifestBatchSchema>;
export type ManifestInput = z.infer<typeof ManifestSchema>;
