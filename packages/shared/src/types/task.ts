import { z } from 'zod';

/**
 * A benchmark task record: one issue, its fix, and where to find the code.
 * Read-only for the whole pipeline.
 */
export const TaskInstanceSchema = z.object({
  instanceId: z.string().min(1),
  /** `owner/name` */
  repo: z.string().min(1),
  /** Full commit id the fix applies to */
  baseCommit: z.string().min(1),
  /** The gold fix, excluding test files */
  patch: z.string(),
  /** Pre-existing test changes from the pull request; may be empty */
  testPatch: z.string().default(''),
  problemStatement: z.string().default(''),
  hintsText: z.string().default(''),
  createdAt: z.string().default(''),
  version: z.string().default(''),
  language: z.string().optional(),
  pullNumber: z.number().int().optional(),
  /** Hash of the repository's dependency manifests, when the collector supplies one */
  manifestHash: z.string().optional(),
});

export type TaskInstance = z.infer<typeof TaskInstanceSchema>;
export type TaskInstanceInput = z.input<typeof TaskInstanceSchema>;
