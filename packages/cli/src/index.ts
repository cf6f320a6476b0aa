import { Command } from 'commander';
import { AppError, exitCodeFor } from '@envforge/shared';
import pkg from '../package.json';
import { registerRunCommand } from './commands/run';
import { registerValidateCommand } from './commands/validate';
import { registerClassifyCommand } from './commands/classify';
import { registerMemoryCommand } from './commands/memory';
import { globalOptions } from './context';

export const name = '@envforge/cli';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('envforge')
    .description('Synthesize and validate executable evaluation environments')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRunCommand(program);
  registerValidateCommand(program);
  registerClassifyCommand(program);
  registerMemoryCommand(program);
  return program;
}

function reportError(program: Command, e: unknown): void {
  const opts = globalOptions(program);

  if (opts.json) {
    const error =
      e instanceof AppError
        ? { code: e.code, message: e.message, details: e.details }
        : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) };
    console.log(JSON.stringify({ error }));
    return;
  }

  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses and runs one command line. Resolves with the exit code for a
 * thrown error, or 0; commands that finish with a verdict set `process.exitCode`.
 */
export async function main(argv: readonly string[], program = buildProgram()): Promise<number> {
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (e) {
    reportError(program, e);
    return exitCodeFor(e);
  }
}
