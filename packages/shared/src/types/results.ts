import { z } from 'zod';

export const FailureReasonSchema = z.enum(['RoundLimitExceeded', 'Regression', 'GenerationFailure']);
export type FailureReason = z.infer<typeof FailureReasonSchema>;

export const ClassificationSchema = z.enum(['FAIL2PASS', 'PASS2PASS', 'FAIL2FAIL', 'PASS2FAIL']);

const ValidationSummarySchema = z.object({
  classification: ClassificationSchema,
  diagnostic: z.string(),
  preExitCode: z.number().nullable(),
  postExitCode: z.number().nullable(),
  minimalFix: z.object({
    performed: z.boolean(),
    passed: z.boolean(),
    trials: z.number().int(),
  }),
});

export type ValidationSummary = z.infer<typeof ValidationSummarySchema>;

/**
 * One line of the durable result store. Records are appended and never rewritten;
 * the newest record for an instance wins.
 */
export const ResultRecordSchema = z.object({
  instanceId: z.string(),
  repo: z.string(),
  status: z.enum(['accepted', 'failed']),
  failureReason: FailureReasonSchema.optional(),
  classification: ClassificationSchema.optional(),
  rounds: z.number().int().nonnegative(),
  /** Memory Pool key of the instance, present on accepted records */
  fingerprint: z.string().optional(),
  version: z.string().optional(),
  testPatch: z.string().optional(),
  environmentSpec: z.string().optional(),
  runScript: z.string().optional(),
  fixPatch: z.string().optional(),
  validation: ValidationSummarySchema.optional(),
  recordedAt: z.string(),
});

export type ResultRecord = z.infer<typeof ResultRecordSchema>;
