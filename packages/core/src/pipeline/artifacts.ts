import path from 'path';
import {
  ARTIFACT_FILES,
  atomicWrite,
  writeJson,
  type ArtifactBundle,
  type ArtifactField,
  type ConversationState,
  type ValidationResult,
  type ValidationSummary,
} from '@envforge/shared';

const FIELDS: readonly ArtifactField[] = ['context', 'testPatch', 'environmentSpec', 'runScript'];

export function summarizeValidation(result: ValidationResult): ValidationSummary {
  return {
    classification: result.classification,
    diagnostic: result.diagnostic,
    preExitCode: result.pre.exitCode,
    postExitCode: result.post.exitCode,
    minimalFix: {
      performed: result.minimalFix.performed,
      passed: result.minimalFix.passed,
      trials: result.minimalFix.trials.length,
    },
  };
}

export async function writeBundle(dir: string, bundle: ArtifactBundle): Promise<void> {
  for (const field of FIELDS) {
    const content = bundle[field];
    if (content !== undefined) {
      await atomicWrite(path.join(dir, ARTIFACT_FILES[field]), content);
    }
  }
}

/** Full logs and the validation report, minus the logs embedded in it */
export async function writeValidation(dir: string, result: ValidationResult): Promise<void> {
  await atomicWrite(path.join(dir, 'pre.log'), result.pre.log);
  await atomicWrite(path.join(dir, 'post.log'), result.post.log);
  await writeJson(path.join(dir, 'validation.json'), {
    ...summarizeValidation(result),
    preStatus: result.pre.status,
    postStatus: result.post.status,
    preDurationMs: result.pre.durationMs,
    postDurationMs: result.post.durationMs,
    minimalFix: result.minimalFix,
  });
}

export interface InstanceStatus {
  instanceId: string;
  status: 'accepted' | 'failed';
  reason?: string;
  rounds: number;
  finishedAt: string;
}

export async function writeStatus(
  dir: string,
  status: InstanceStatus,
  conversation: ConversationState,
): Promise<void> {
  await writeJson(path.join(dir, 'status.json'), status);
  await writeJson(path.join(dir, 'conversation.json'), conversation);
}
