import path from 'path';
import { InvalidArgumentError, type Command } from 'commander';
import { ConfigLoader } from '@envforge/core';
import { JsonlLogger, type Config, type ConfigInput, type Logger } from '@envforge/shared';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

export function loadConfig(program: Command, flags: ConfigInput = {}): Config {
  return ConfigLoader.load({ configPath: globalOptions(program).config, flags });
}

/** Events go to `<outputDir>/trace.jsonl`; messages go to the console */
export function createLogger(config: Config, verbose = false): Logger {
  return new JsonlLogger(path.join(config.outputDir, 'trace.jsonl'), {}, { verbose });
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}
