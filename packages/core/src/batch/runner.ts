import path from 'path';
import {
  logger as defaultLogger,
  writeJson,
  type Config,
  type FailureReason,
  type GeneratorSet,
  type Logger,
  type TaskInstance,
} from '@envforge/shared';
import type { SandboxProvider } from '@envforge/exec';
import { seedFromResults, type MemoryPool } from '@envforge/memory';
import { Orchestrator, type InstanceValidator, type ProcessOutcome } from '../pipeline/orchestrator';
import { ResultStore } from '../results/store';
import { Validator } from '../validation/validator';
import { runPool } from './pool';

export interface BatchRunnerOptions {
  config: Config;
  provider: SandboxProvider;
  generators: GeneratorSet;
  memoryPool?: MemoryPool;
  logger?: Logger;
  runId?: string;
  /** Overrides the validator built from `provider` */
  validator?: InstanceValidator;
}

export interface InstanceSummary {
  instanceId: string;
  status: ProcessOutcome['status'];
  rounds?: number;
  reason?: string;
}

export interface BatchSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  total: number;
  accepted: number;
  failed: number;
  skipped: number;
  /** Failed instances by reason */
  failureReasons: Partial<Record<FailureReason, string[]>>;
  instances: InstanceSummary[];
}

export function createRunId(now = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

function summarize(outcome: ProcessOutcome): InstanceSummary {
  switch (outcome.status) {
    case 'accepted':
      return { instanceId: outcome.instanceId, status: outcome.status, rounds: outcome.rounds };
    case 'failed':
      return {
        instanceId: outcome.instanceId,
        status: outcome.status,
        rounds: outcome.rounds,
        reason: outcome.reason,
      };
    case 'skipped':
      return { instanceId: outcome.instanceId, status: outcome.status, reason: outcome.reason };
  }
}

/** 0 when every selected instance was accepted or skipped */
export function batchExitCode(summary: BatchSummary): number {
  return summary.failed === 0 ? 0 : 1;
}

export class BatchRunner {
  private readonly logger: Logger;
  readonly runId: string;

  constructor(private readonly options: BatchRunnerOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.runId = options.runId ?? createRunId();
  }

  async run(tasks: readonly TaskInstance[]): Promise<BatchSummary> {
    const { config, memoryPool } = this.options;
    const startedAt = new Date().toISOString();

    await this.options.provider.ping();

    const store = new ResultStore(config.resultsPath, this.logger);
    await store.load();

    if (memoryPool && config.memoryPool.seedFromResults) {
      const seeded = seedFromResults(memoryPool, store.all());
      if (seeded > 0) {
        await this.logger.info(`Seeded the Memory Pool with ${seeded} environment(s) from ${config.resultsPath}`);
      }
    }

    const validator =
      this.options.validator ??
      new Validator({
        provider: this.options.provider,
        sandbox: config.sandbox,
        minimalFix: config.minimalFix,
        logger: this.logger,
      });

    await this.logger.info(`Processing ${tasks.length} instance(s) with ${config.workers} worker(s)`);
    const outcomes = await runPool(tasks, config.workers, (instance) => {
      const orchestrator = new Orchestrator({
        config,
        generators: this.options.generators,
        validator,
        resultStore: store,
        memoryPool,
        runId: this.runId,
        logger: this.logger.child({ instance: instance.instanceId }),
      });
      return orchestrator.process(instance);
    });

    const summary = this.summarize(outcomes, startedAt);
    await writeJson(path.join(config.outputDir, 'summary.json'), summary);
    return summary;
  }

  private summarize(outcomes: ProcessOutcome[], startedAt: string): BatchSummary {
    const failureReasons: Partial<Record<FailureReason, string[]>> = {};
    for (const outcome of outcomes) {
      if (outcome.status === 'failed') {
        (failureReasons[outcome.reason] ??= []).push(outcome.instanceId);
      }
    }
    const count = (status: ProcessOutcome['status']) =>
      outcomes.filter((o) => o.status === status).length;

    return {
      runId: this.runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      total: outcomes.length,
      accepted: count('accepted'),
      failed: count('failed'),
      skipped: count('skipped'),
      failureReasons,
      instances: outcomes.map(summarize),
    };
  }
}
