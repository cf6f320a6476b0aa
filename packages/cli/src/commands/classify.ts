import path from 'path';
import { promises as fs } from 'fs';
import type { Command } from 'commander';
import { classify } from '@envforge/core';
import { toRunOutcome } from '@envforge/exec';
import { UsageError, readTextIfExists, writeJson, type Classification } from '@envforge/shared';
import { OutputRenderer } from '../output/renderer';
import { globalOptions } from '../context';

export type LogBucket = 'fail2pass' | 'pass2pass' | 'fail2fail' | 'pass2fail' | 'error';

export interface LogClassification {
  total: number;
  counts: Record<LogBucket, number>;
  /** Directory names per bucket */
  instances: Record<LogBucket, string[]>;
}

const BUCKETS: Readonly<Record<Classification, LogBucket>> = {
  FAIL2PASS: 'fail2pass',
  PASS2PASS: 'pass2pass',
  FAIL2FAIL: 'fail2fail',
  PASS2FAIL: 'pass2fail',
};

export const CLASSIFICATION_FILE = 'classification.json';

function outcomeOf(log: string) {
  return toRunOutcome({ output: log, exitCode: 0, timedOut: false, durationMs: 0 });
}

/**
 * Classifies every `<dir>/<name>/{pre,post}.log` pair by its `EXIT_CODE=`
 * markers. Subdirectories without both logs are ignored.
 */
export async function classifyLogDirs(dir: string): Promise<LogClassification> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    throw new UsageError(`Cannot read log directory ${dir}`, { cause: error });
  });

  const result: LogClassification = {
    total: 0,
    counts: { fail2pass: 0, pass2pass: 0, fail2fail: 0, pass2fail: 0, error: 0 },
    instances: { fail2pass: [], pass2pass: [], fail2fail: [], pass2fail: [], error: [] },
  };

  const names = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  for (const name of names) {
    const preLog = await readTextIfExists(path.join(dir, name, 'pre.log'));
    const postLog = await readTextIfExists(path.join(dir, name, 'post.log'));
    if (preLog === undefined || postLog === undefined) continue;

    const pre = outcomeOf(preLog);
    const post = outcomeOf(postLog);
    const bucket: LogBucket =
      pre.status === 'error' || post.status === 'error' ? 'error' : BUCKETS[classify(pre, post).classification];

    result.total++;
    result.counts[bucket]++;
    result.instances[bucket].push(name);
  }
  return result;
}

export function registerClassifyCommand(program: Command) {
  program
    .command('classify')
    .description('Classify saved pre.log/post.log pairs by their exit markers')
    .argument('<dir>', 'Directory with one subdirectory per instance')
    .option('--out <path>', `Summary file (default: <dir>/${CLASSIFICATION_FILE})`)
    .action(async (dir: string, options: { out?: string }) => {
      const renderer = new OutputRenderer(!!globalOptions(program).json);
      const result = await classifyLogDirs(dir);
      const outPath = options.out ?? path.join(dir, CLASSIFICATION_FILE);
      await writeJson(outPath, result);
      renderer.renderClassification(result, outPath);
    });
}
