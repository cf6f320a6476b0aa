import type { Command } from 'commander';
import { BatchRunner, batchExitCode, loadTasks, readTaskList } from '@envforge/core';
import { DockerSandboxProvider } from '@envforge/exec';
import { createMemoryPool } from '@envforge/memory';
import { createGenerators } from '@envforge/adapters';
import { UsageError, type ConfigInput } from '@envforge/shared';
import { OutputRenderer } from '../output/renderer';
import { createLogger, globalOptions, loadConfig, parseInteger } from '../context';

export interface RunOptions {
  tasks: string;
  workers?: number;
  rounds?: number;
  outputDir?: string;
  setupDir?: string;
  results?: string;
  task?: string;
  taskList?: string;
  force?: boolean;
  /** false when --no-memory-pool is given */
  memoryPool?: boolean;
  memoryPath?: string;
  generator?: 'command' | 'static';
  staticDir?: string;
  mutations?: number;
}

/**
 * Maps `run` flags onto the config file shape so they take precedence in the merge.
 */
export function runFlagsToConfig(options: RunOptions): ConfigInput {
  const flags: ConfigInput = {};
  if (options.workers !== undefined) flags.workers = options.workers;
  if (options.rounds !== undefined) flags.roundLimit = options.rounds;
  if (options.outputDir) flags.outputDir = options.outputDir;
  if (options.setupDir) flags.setupDir = options.setupDir;
  if (options.results) flags.resultsPath = options.results;
  if (options.force) flags.forceRefresh = true;

  if (options.memoryPool === false) {
    flags.memoryPool = { enabled: false };
  } else if (options.memoryPath) {
    flags.memoryPool = { backend: 'sqlite', path: options.memoryPath };
  }

  if (options.generator || options.staticDir) {
    flags.generators = {
      ...(options.generator ? { backend: options.generator } : {}),
      ...(options.staticDir ? { static: { dir: options.staticDir } } : {}),
    };
  }
  if (options.mutations !== undefined) flags.minimalFix = { mutations: options.mutations };
  return flags;
}

function parseBackend(value: string): 'command' | 'static' {
  if (value === 'command' || value === 'static') return value;
  throw new UsageError(`Unknown generator backend "${value}" (expected command or static)`);
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Synthesize and validate environments for a batch of task instances')
    .requiredOption('--tasks <path>', 'Task instances (JSONL or JSON array)')
    .option('--workers <n>', 'Instances processed concurrently', parseInteger)
    .option('--rounds <n>', 'Round limit per instance', parseInteger)
    .option('--output-dir <dir>', 'Where accepted bundles, the trace and summary.json go')
    .option('--setup-dir <dir>', 'Per-round working copies of artifacts and logs')
    .option('--results <path>', 'Result store (JSONL)')
    .option('--task <id>', 'Process only this instance')
    .option('--task-list <file>', 'Process only the instance ids listed in this file')
    .option('--force', 'Reprocess instances that already have a result')
    .option('--no-memory-pool', 'Disable environment reuse')
    .option('--memory-path <path>', 'Persist the Memory Pool in this SQLite file')
    .option('--generator <backend>', 'Generator backend: command or static', parseBackend)
    .option('--static-dir <dir>', 'Pre-authored artifacts for the static backend')
    .option('--mutations <n>', 'Random edits tried by the minimal-fix check', parseInteger)
    .action(async (options: RunOptions) => {
      const global = globalOptions(program);
      const renderer = new OutputRenderer(!!global.json);
      const config = loadConfig(program, runFlagsToConfig(options));
      const logger = createLogger(config, global.verbose);

      const taskIds = options.taskList ? await readTaskList(options.taskList) : undefined;
      const tasks = await loadTasks(options.tasks, { taskId: options.task, taskIds });
      if (tasks.length === 0) {
        throw new UsageError(`No task instances selected from ${options.tasks}`);
      }

      const memoryPool = config.memoryPool.enabled ? createMemoryPool(config.memoryPool) : undefined;
      try {
        const runner = new BatchRunner({
          config,
          provider: new DockerSandboxProvider({ config: config.sandbox, logger }),
          generators: createGenerators(config.generators, { logger }),
          memoryPool,
          logger,
        });
        const summary = await runner.run(tasks);
        renderer.renderBatch(summary);
        process.exitCode = batchExitCode(summary);
      } finally {
        memoryPool?.close();
      }
    });
}
