import path from 'path';
import type { Command } from 'commander';
import { Validator, loadTasks, runPool, summarizeValidation, type InstanceValidator } from '@envforge/core';
import { DockerSandboxProvider } from '@envforge/exec';
import { StaticGenerator } from '@envforge/adapters';
import {
  writeJson,
  type GenerationRequest,
  type Stage,
  type TaskInstance,
  type ValidationSummary,
} from '@envforge/shared';
import { OutputRenderer } from '../output/renderer';
import { createLogger, globalOptions, loadConfig, parseInteger } from '../context';

export type F2PEntry =
  | ({ instanceId: string; status: 'validated' } & ValidationSummary)
  | { instanceId: string; status: 'missing'; reason: string };

export interface F2PReport {
  artifactsDir: string;
  total: number;
  fail2pass: number;
  instances: F2PEntry[];
}

export const F2P_REPORT_FILE = 'f2p_report.json';

export interface ValidateArtifactsOptions {
  dir: string;
  workers: number;
  validator: InstanceValidator;
}

type Artifacts = { testPatch: string; environmentSpec: string; runScript: string };

async function readArtifacts(
  instance: TaskInstance,
  dir: string,
): Promise<{ ok: true; artifacts: Artifacts } | { ok: false; reason: string }> {
  const request: GenerationRequest = { instance, bundle: {}, round: 0 };
  const read = (stage: Stage) => new StaticGenerator(stage, dir).generate(request);

  const env = await read('env');
  if (!env.ok) return env;
  const run = await read('run');
  if (!run.ok) return run;
  const test = await read('test');
  // Instances that ship their own tests may have no test.patch beside the Dockerfile
  if (!test.ok && !instance.testPatch) return test;

  return {
    ok: true,
    artifacts: {
      testPatch: test.ok ? test.artifact : instance.testPatch,
      environmentSpec: env.artifact,
      runScript: run.artifact,
    },
  };
}

/**
 * Re-validates pre-authored artifacts once per instance, without any
 * generation or retries, and reports which instances are FAIL2PASS.
 */
export async function validateArtifacts(
  tasks: readonly TaskInstance[],
  options: ValidateArtifactsOptions,
): Promise<F2PReport> {
  const instances = await runPool(tasks, options.workers, async (instance): Promise<F2PEntry> => {
    const read = await readArtifacts(instance, options.dir);
    if (!read.ok) {
      return { instanceId: instance.instanceId, status: 'missing', reason: read.reason };
    }
    const result = await options.validator.validate({
      ...read.artifacts,
      fixPatch: instance.patch,
      baseCommit: instance.baseCommit,
      label: instance.instanceId,
    });
    return { instanceId: instance.instanceId, status: 'validated', ...summarizeValidation(result) };
  });

  return {
    artifactsDir: options.dir,
    total: instances.length,
    fail2pass: instances.filter((e) => e.status === 'validated' && e.classification === 'FAIL2PASS').length,
    instances,
  };
}

export function registerValidateCommand(program: Command) {
  program
    .command('validate')
    .description('Re-validate pre-authored artifacts and write a fail-to-pass report')
    .requiredOption('--artifacts <dir>', 'Directory with one <instanceId>/ folder of artifacts per instance')
    .requiredOption('--tasks <path>', 'Task instances (JSONL or JSON array)')
    .option('--workers <n>', 'Instances validated concurrently', parseInteger)
    .action(async (options: { artifacts: string; tasks: string; workers?: number }) => {
      const global = globalOptions(program);
      const renderer = new OutputRenderer(!!global.json);
      const config = loadConfig(program, options.workers !== undefined ? { workers: options.workers } : {});
      const logger = createLogger(config, global.verbose);

      const tasks = await loadTasks(options.tasks);
      const provider = new DockerSandboxProvider({ config: config.sandbox, logger });
      await provider.ping();
      const validator = new Validator({
        provider,
        sandbox: config.sandbox,
        minimalFix: config.minimalFix,
        logger,
      });
      const report = await validateArtifacts(tasks, {
        dir: options.artifacts,
        workers: config.workers,
        validator,
      });

      const reportPath = path.join(options.artifacts, F2P_REPORT_FILE);
      await writeJson(reportPath, report);
      renderer.renderValidation(report, reportPath);
      process.exitCode = report.fail2pass > 0 ? 0 : 1;
    });
}
