import {
  GenerationError,
  type ArtifactBundle,
  type ArtifactField,
  type ConversationEntry,
  type GenerationRequest,
  type GeneratorSet,
  type Stage,
  type TaskInstance,
} from '@envforge/shared';
import { envelope, type EventSink } from '../events/emit';
import { STAGE_INPUTS, outputOf, producerOf } from './stages';
import { postProcess } from './postprocess';

/** Mutable per-instance generation state, owned by one worker */
export interface DispatchContext {
  instance: TaskInstance;
  bundle: ArtifactBundle;
  round: number;
  /** Pending feedback per stage; consumed by the next generation of that stage */
  hints: Partial<Record<Stage, string>>;
  history: ConversationEntry[];
  reference?: GenerationRequest['reference'];
}

export type EnsureResult = { ok: true } | { ok: false; stage: Stage; reason: string };

/**
 * Produces artifacts on demand. Asking for a field first produces every
 * missing input of the stage behind it; fields already present are reused.
 */
export class StageDispatcher {
  constructor(
    private readonly generators: GeneratorSet,
    private readonly emit: EventSink,
    private readonly runId: string,
  ) {}

  async ensureAll(fields: readonly ArtifactField[], ctx: DispatchContext): Promise<EnsureResult> {
    for (const field of fields) {
      const result = await this.ensure(field, ctx);
      if (!result.ok) return result;
    }
    return { ok: true };
  }

  async ensure(field: ArtifactField, ctx: DispatchContext): Promise<EnsureResult> {
    if (ctx.bundle[field] !== undefined) {
      return { ok: true };
    }
    const stage = producerOf(field);
    const inputs = await this.ensureAll(STAGE_INPUTS[stage], ctx);
    if (!inputs.ok) return inputs;
    return this.runStage(stage, ctx);
  }

  private async runStage(stage: Stage, ctx: DispatchContext): Promise<EnsureResult> {
    const instanceId = ctx.instance.instanceId;
    const hint = ctx.hints[stage];
    delete ctx.hints[stage];

    await this.emit({
      ...envelope(this.runId),
      type: 'StageStarted',
      payload: { instanceId, stage, round: ctx.round },
    });

    const request: GenerationRequest = {
      instance: ctx.instance,
      bundle: { ...ctx.bundle },
      hint,
      round: ctx.round,
      ...(ctx.reference && (stage === 'env' || stage === 'run') ? { reference: ctx.reference } : {}),
    };

    let reason: string;
    try {
      const outcome = await this.generators[stage].generate(request);
      if (outcome.ok) {
        const artifact = postProcess(stage, outcome.artifact, ctx.instance.testPatch);
        if (artifact.trim()) {
          ctx.bundle[outputOf(stage)] = artifact;
          ctx.history.push({ round: ctx.round, stage, hint, outcome: 'ok' });
          await this.emit({
            ...envelope(this.runId),
            type: 'StageCompleted',
            payload: { instanceId, stage, round: ctx.round, size: artifact.length },
          });
          return { ok: true };
        }
        reason = 'empty artifact';
      } else {
        reason = outcome.reason;
      }
    } catch (error) {
      // Generation errors are per-instance; anything else (infrastructure) is not.
      if (!(error instanceof GenerationError)) throw error;
      reason = error.message;
    }

    ctx.history.push({ round: ctx.round, stage, hint, outcome: 'generation_failed' });
    await this.emit(
      {
        ...envelope(this.runId),
        type: 'StageFailed',
        payload: { instanceId, stage, round: ctx.round, reason },
      },
      `${stage} generation failed: ${reason}`,
    );
    return { ok: false, stage, reason };
  }
}
