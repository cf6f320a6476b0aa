export type Stage = 'context' | 'test' | 'env' | 'run';

export const STAGES: readonly Stage[] = ['context', 'test', 'env', 'run'];

/**
 * The artifacts synthesized for one instance. Every field is produced and
 * overwritten independently by its stage.
 */
export interface ArtifactBundle {
  /** Summary of relevant code, build system and test layout */
  context?: string;
  /** Unified diff adding or modifying tests */
  testPatch?: string;
  /** Dockerfile */
  environmentSpec?: string;
  /** Shell script that runs the tests and prints `EXIT_CODE=<n>` */
  runScript?: string;
}

export type ArtifactField = keyof ArtifactBundle;

export const STAGE_OUTPUT: Readonly<Record<Stage, ArtifactField>> = {
  context: 'context',
  test: 'testPatch',
  env: 'environmentSpec',
  run: 'runScript',
};

/**
 * File names used when an accepted bundle is written to disk, and when
 * pre-authored artifacts are read back.
 */
export const ARTIFACT_FILES: Readonly<Record<ArtifactField, string>> = {
  context: 'context.md',
  testPatch: 'test.patch',
  environmentSpec: 'Dockerfile',
  runScript: 'eval.sh',
};
