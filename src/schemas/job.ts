import { z } from 'zod';

export const JobStatusSchema = z.enum(['queued', 'running', 'done', 'error', 'canceled']);

// Shape only; ranges are enforced by the command builder so every caller gets the same errors.
const KeyingSchema = z.object({
  keyColor: z.string().min(1),
  similarity: z.number(),
  blend: z.number(),
});

export const RenderRequestSchema = KeyingSchema.extend({
  crf: z.number().int().optional(),
  includeAudio: z.boolean().optional(),
});

export const PreviewRequestSchema = KeyingSchema.extend({
  time: z.number().min(0).optional(),
  maxWidth: z.number().int().positive().optional(),
});

export const JobListQuerySchema = z.object({
  assetId: z.string().optional(),
  status: JobStatusSchema.optional(),
  cursor: z.string().optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(100)
  ).default(50),
});

export const AssetParamsSchema = z.object({
  assetId: z.string().min(1),
});

export const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export type RenderRequest = z.infer<typeof RenderRequestSchema>;
export type PreviewRequest = z.infer<typeof PreviewRequestSchema>;
export type JobListQuery = z.infer<typeof JobListQuerySchema>;
