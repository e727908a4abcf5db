import { z } from 'zod';

export const PagerConfigSchema = z.object({
  /** Rows requested per offset page (`$top`). */
  pageSize: z.number().int().positive().default(1000),
  /** Consecutive pages without a new identity before giving up, when no stop target is known. */
  idlePageThreshold: z.number().int().positive().default(5),
  /** Hard ceiling on page requests per run. */
  maxPages: z.number().int().positive().default(20_000),
  /** Courtesy pause between successful pages. */
  pageDelayMs: z.number().int().nonnegative().default(250),
  /** Optional cap on unique records returned. */
  maxRecords: z.number().int().positive().optional(),
});

export type PagerConfig = z.infer<typeof PagerConfigSchema>;

export const resolvePagerConfig = (input: z.input<typeof PagerConfigSchema> = {}): PagerConfig =>
  PagerConfigSchema.parse(input);
