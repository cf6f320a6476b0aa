import { STAGES, STAGE_OUTPUT, type ArtifactField, type Stage } from '@envforge/shared';

/** Artifacts a stage reads; they are produced first when missing */
export const STAGE_INPUTS: Readonly<Record<Stage, readonly ArtifactField[]>> = {
  context: [],
  test: ['context'],
  env: ['context'],
  run: ['context', 'environmentSpec', 'testPatch'],
};

/** Artifacts a validation needs */
export const VALIDATION_INPUTS: readonly ArtifactField[] = [
  'testPatch',
  'environmentSpec',
  'runScript',
];

const PRODUCER: Readonly<Record<ArtifactField, Stage>> = {
  context: 'context',
  testPatch: 'test',
  environmentSpec: 'env',
  runScript: 'run',
};

export function producerOf(field: ArtifactField): Stage {
  return PRODUCER[field];
}

export function outputOf(stage: Stage): ArtifactField {
  return STAGE_OUTPUT[stage];
}

/**
 * Fields that must be regenerated once `stage` is retried: its own output and
 * everything downstream of it.
 */
export function invalidatedBy(stage: Stage): ArtifactField[] {
  const out = new Set<ArtifactField>([outputOf(stage)]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const consumer of STAGES) {
      const output = outputOf(consumer);
      if (!out.has(output) && STAGE_INPUTS[consumer].some((f) => out.has(f))) {
        out.add(output);
        grew = true;
      }
    }
  }
  return [...out];
}
