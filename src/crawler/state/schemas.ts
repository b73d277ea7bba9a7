import { z } from 'zod';

export const CacheStatusSchema = z.enum([
  'success',
  'failed_retryable_exhausted',
  'failed_permanent',
  'skipped',
]);

export const CacheEntrySchema = z.object({
  status: CacheStatusSchema,
  timestamp: z.number().finite().nonnegative(),
});

export const CacheRecordSchema = z.record(z.string().url(), CacheEntrySchema);

export const FrontierEntrySchema = z.object({
  url: z.string().url(),
  depth: z.number().int().nonnegative(),
  retryCount: z.number().int().nonnegative(),
});

export const DomainStateSchema = z.object({
  domain: z.string().min(1),
  lastRequestTime: z.number().nullable(),
  currentDelayMs: z.number().nonnegative(),
  cooldownUntil: z.number(),
  consecutiveErrors: z.number().int().nonnegative(),
  skipped: z.boolean(),
});

export const CheckpointStateSchema = z.object({
  version: z.literal(1),
  frontier: z.array(FrontierEntrySchema),
  cacheRef: z.string(),
  processedCount: z.number().int().nonnegative(),
  configFingerprint: z.string().min(1),
  domains: z.array(DomainStateSchema),
  createdAt: z.string(),
  cache: CacheRecordSchema.optional(),
});
