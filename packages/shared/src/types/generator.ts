import type { ArtifactBundle, Stage } from './artifacts';
import type { TaskInstance } from './task';

export interface GenerationRequest {
  instance: TaskInstance;
  bundle: Readonly<ArtifactBundle>;
  /** Feedback from the previous validation, when this is a retry */
  hint?: string;
  round: number;
  /**
   * A validated environment from the same repository at a nearby version,
   * offered as a starting point for the env and run stages.
   */
  reference?: {
    environmentSpec: string;
    runScript: string;
    sourceInstanceId: string;
  };
}

export type GeneratorOutcome = { ok: true; artifact: string } | { ok: false; reason: string };

/**
 * Produces one artifact for one stage. Backends must not throw for
 * recoverable failures; they return `{ ok: false }` instead.
 */
export interface ArtifactGenerator {
  readonly stage: Stage;
  generate(request: GenerationRequest): Promise<GeneratorOutcome>;
}

export type GeneratorSet = Readonly<Record<Stage, ArtifactGenerator>>;
