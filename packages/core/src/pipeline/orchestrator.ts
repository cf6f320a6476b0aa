import path from 'path';
import {
  normalizePatch,
  logger as defaultLogger,
  touchedFiles,
  type ArtifactBundle,
  type ArtifactField,
  type Config,
  type FailureReason,
  type GeneratorSet,
  type Logger,
  type ResultRecord,
  type Stage,
  type TaskInstance,
  type ValidationResult,
} from '@envforge/shared';
import {
  findReference,
  fingerprint as fingerprintOf,
  type MemoryPool,
} from '@envforge/memory';
import { envelope, eventSink, type EventSink } from '../events/emit';
import { StageDispatcher, type DispatchContext } from '../generation/dispatcher';
import { VALIDATION_INPUTS, invalidatedBy, outputOf } from '../generation/stages';
import {
  outcomeLabel,
  route,
  routeGenerationFailure,
  type RetryDecision,
} from '../feedback/router';
import type { ResultStore } from '../results/store';
import type { ValidationRequest } from '../validation/validator';
import { summarizeValidation, writeBundle, writeStatus, writeValidation } from './artifacts';

export interface InstanceValidator {
  validate(request: ValidationRequest): Promise<ValidationResult>;
}

export interface OrchestratorOptions {
  config: Config;
  generators: GeneratorSet;
  validator: InstanceValidator;
  resultStore: ResultStore;
  /** Omitted when the Memory Pool is disabled */
  memoryPool?: MemoryPool;
  runId: string;
  logger?: Logger;
}

export type ProcessOutcome =
  | { status: 'accepted'; instanceId: string; rounds: number; record: ResultRecord }
  | {
      status: 'failed';
      instanceId: string;
      rounds: number;
      reason: FailureReason;
      record: ResultRecord;
    }
  | { status: 'skipped'; instanceId: string; reason: string; record: ResultRecord };

interface InstanceRun {
  instance: TaskInstance;
  ctx: DispatchContext;
  fingerprint: string;
  /** Fields that came from the Memory Pool or the instance, not from a generator */
  seeded: Set<ArtifactField>;
  lastResult?: ValidationResult;
  /** The bundle that produced `lastResult` */
  lastBundle?: ArtifactBundle;
}

/**
 * Drives one instance through context, test, env and run generation and
 * validation until it is accepted, rejected or out of rounds.
 */
export class Orchestrator {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly emit: EventSink;
  private readonly dispatcher: StageDispatcher;

  constructor(private readonly options: OrchestratorOptions) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.emit = eventSink(this.logger);
    this.dispatcher = new StageDispatcher(options.generators, this.emit, options.runId);
  }

  async process(instance: TaskInstance): Promise<ProcessOutcome> {
    const { instanceId } = instance;
    const skip = this.skipped(instanceId);
    if (skip) {
      await this.emit(
        {
          ...envelope(this.options.runId),
          type: 'InstanceSkipped',
          payload: { instanceId, reason: skip.reason },
        },
        `${instanceId}: skipped (${skip.reason})`,
      );
      return { status: 'skipped', instanceId, ...skip };
    }

    await this.emit({
      ...envelope(this.options.runId),
      type: 'InstanceStarted',
      payload: { instanceId, repo: instance.repo },
    });

    const run = await this.prepare(instance);
    return this.loop(run);
  }

  private skipped(instanceId: string): { reason: string; record: ResultRecord } | undefined {
    if (this.config.forceRefresh) return undefined;
    const record = this.options.resultStore.latest(instanceId);
    if (record?.status === 'accepted') return { reason: 'already accepted', record };
    if (record?.status === 'failed' && !this.config.resume.retryFailed) {
      return { reason: 'failed previously', record };
    }
    return undefined;
  }

  private async prepare(instance: TaskInstance): Promise<InstanceRun> {
    const ctx: DispatchContext = { instance, bundle: {}, round: 0, hints: {}, history: [] };
    const seeded = new Set<ArtifactField>();
    const fingerprint = fingerprintOf(instance);
    const pool = this.options.memoryPool;

    if (pool) {
      const hit = pool.lookup(fingerprint);
      if (hit) {
        ctx.bundle.environmentSpec = hit.environmentSpec;
        ctx.bundle.runScript = hit.runScript;
        seeded.add('environmentSpec');
        seeded.add('runScript');
        await this.emit(
          {
            ...envelope(this.options.runId),
            type: 'MemoryPoolHit',
            payload: {
              instanceId: instance.instanceId,
              fingerprint,
              sourceInstanceId: hit.sourceInstanceId,
            },
          },
          `${instance.instanceId}: reusing environment of ${hit.sourceInstanceId}`,
        );
      } else {
        const reference = findReference(pool, instance.repo, instance.version);
        if (reference) {
          ctx.reference = {
            environmentSpec: reference.environmentSpec,
            runScript: reference.runScript,
            sourceInstanceId: reference.sourceInstanceId,
          };
        }
      }
    }

    if (touchedFiles(instance.testPatch).length >= this.config.testGeneration.minTestFiles) {
      ctx.bundle.testPatch = normalizePatch(instance.testPatch);
      seeded.add('testPatch');
    }

    return { instance, ctx, fingerprint, seeded };
  }

  private async loop(run: InstanceRun): Promise<ProcessOutcome> {
    const { ctx, instance } = run;
    const { instanceId } = instance;

    for (;;) {
      let retry: RetryDecision;
      const ready = await this.dispatcher.ensureAll(VALIDATION_INPUTS, ctx);

      if (!ready.ok) {
        retry = routeGenerationFailure(ready.stage, ready.reason);
      } else {
        const result = await this.options.validator.validate({
          environmentSpec: ctx.bundle.environmentSpec ?? '',
          runScript: ctx.bundle.runScript ?? '',
          testPatch: ctx.bundle.testPatch ?? '',
          fixPatch: instance.patch,
          baseCommit: instance.baseCommit,
          label: instanceId,
        });
        run.lastResult = result;
        run.lastBundle = { ...ctx.bundle };
        await this.snapshot(run, result);

        const decision = route(
          result,
          { round: ctx.round, history: ctx.history },
          { excerptLines: this.config.feedback.excerptLines },
        );
        ctx.history.push({ round: ctx.round, stage: 'validate', outcome: outcomeLabel(result) });

        await this.emit(
          {
            ...envelope(this.options.runId),
            type: 'ValidationCompleted',
            payload: {
              instanceId,
              round: ctx.round,
              classification: result.classification,
              diagnostic: result.diagnostic,
              preExitCode: result.pre.exitCode,
              postExitCode: result.post.exitCode,
              weakTest: result.classification === 'FAIL2PASS' && !result.minimalFix.passed,
            },
          },
          `${instanceId}: round ${ctx.round} ${outcomeLabel(result)}`,
        );

        if (decision.action === 'accept') {
          return this.accept(run, result);
        }
        if (decision.action === 'reject') {
          return this.fail(run, decision.reason, ctx.round + 1);
        }
        retry = decision;
      }

      ctx.round += 1;
      if (ctx.round >= this.config.roundLimit) {
        const reason = run.lastResult ? 'RoundLimitExceeded' : 'GenerationFailure';
        return this.fail(run, reason, ctx.round);
      }

      this.invalidate(run, retry.stage);
      ctx.hints[retry.stage] = retry.hint;
      await this.emit(
        {
          ...envelope(this.options.runId),
          type: 'RetryRouted',
          payload: { instanceId, round: ctx.round, stage: retry.stage, hint: retry.hint },
        },
        `${instanceId}: retrying ${retry.stage} (round ${ctx.round})`,
      );
    }
  }

  /**
   * Drops the retried stage's output and every generated artifact built on
   * it. Seeded dependents are kept, except a seeded run script once the test
   * patch it was written for is regenerated.
   */
  private invalidate(run: InstanceRun, stage: Stage): void {
    const own = outputOf(stage);
    const fields = invalidatedBy(stage);
    const regenerated = (field: ArtifactField) =>
      fields.includes(field) && (field === own || !run.seeded.has(field));
    for (const field of fields) {
      if (regenerated(field) || (field === 'runScript' && regenerated('testPatch'))) {
        delete run.ctx.bundle[field];
        run.seeded.delete(field);
      }
    }
  }

  private async snapshot(run: InstanceRun, result: ValidationResult): Promise<void> {
    const dir = path.join(this.config.setupDir, run.instance.instanceId, `round-${run.ctx.round}`);
    await writeBundle(dir, run.ctx.bundle);
    await writeValidation(dir, result);
  }

  private async accept(run: InstanceRun, result: ValidationResult): Promise<ProcessOutcome> {
    const { instance, ctx } = run;
    const rounds = ctx.round + 1;
    const recordedAt = new Date().toISOString();
    const dir = path.join(this.config.outputDir, instance.instanceId);

    await writeBundle(dir, ctx.bundle);
    await writeValidation(dir, result);
    await writeStatus(
      dir,
      { instanceId: instance.instanceId, status: 'accepted', rounds, finishedAt: recordedAt },
      { round: ctx.round, history: ctx.history },
    );

    const record: ResultRecord = {
      instanceId: instance.instanceId,
      repo: instance.repo,
      status: 'accepted',
      classification: result.classification,
      rounds,
      fingerprint: run.fingerprint,
      version: instance.version,
      testPatch: ctx.bundle.testPatch,
      environmentSpec: ctx.bundle.environmentSpec,
      runScript: ctx.bundle.runScript,
      fixPatch: instance.patch,
      validation: summarizeValidation(result),
      recordedAt,
    };
    await this.options.resultStore.append(record);

    if (this.options.memoryPool && ctx.bundle.environmentSpec && ctx.bundle.runScript) {
      this.options.memoryPool.commit({
        fingerprint: run.fingerprint,
        repo: instance.repo,
        version: instance.version,
        environmentSpec: ctx.bundle.environmentSpec,
        runScript: ctx.bundle.runScript,
        sourceInstanceId: instance.instanceId,
        updatedAt: recordedAt,
      });
    }

    await this.emit(
      {
        ...envelope(this.options.runId),
        type: 'InstanceAccepted',
        payload: { instanceId: instance.instanceId, rounds },
      },
      `${instance.instanceId}: accepted after ${rounds} round(s)`,
    );
    return { status: 'accepted', instanceId: instance.instanceId, rounds, record };
  }

  private async fail(run: InstanceRun, reason: FailureReason, rounds: number): Promise<ProcessOutcome> {
    const { instance, ctx, lastResult, lastBundle } = run;
    const recordedAt = new Date().toISOString();
    const dir = path.join(this.config.outputDir, instance.instanceId);

    await writeStatus(
      dir,
      { instanceId: instance.instanceId, status: 'failed', reason, rounds, finishedAt: recordedAt },
      { round: ctx.round, history: ctx.history },
    );

    const record: ResultRecord = {
      instanceId: instance.instanceId,
      repo: instance.repo,
      status: 'failed',
      failureReason: reason,
      rounds,
      version: instance.version,
      ...(lastResult
        ? { classification: lastResult.classification, validation: summarizeValidation(lastResult) }
        : {}),
      ...(lastBundle?.testPatch ? { testPatch: lastBundle.testPatch } : {}),
      ...(lastBundle?.environmentSpec ? { environmentSpec: lastBundle.environmentSpec } : {}),
      ...(lastBundle?.runScript ? { runScript: lastBundle.runScript } : {}),
      recordedAt,
    };
    await this.options.resultStore.append(record);

    await this.emit(
      {
        ...envelope(this.options.runId),
        type: 'InstanceFailed',
        payload: { instanceId: instance.instanceId, rounds, reason },
      },
      `${instance.instanceId}: failed (${reason}) after ${rounds} round(s)`,
    );
    return { status: 'failed', instanceId: instance.instanceId, rounds, reason, record };
  }
}
