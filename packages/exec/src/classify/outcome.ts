import type { RunOutcome } from '@envforge/shared';

const EXIT_MARKER = /EXIT_CODE=(\d+)/g;

/**
 * Returns the value of the last `EXIT_CODE=<int>` marker in the output, or
 * null when the run script never reached its final echo.
 */
export function extractExitCode(output: string): number | null {
  let last: number | null = null;
  for (const match of output.matchAll(EXIT_MARKER)) {
    last = Number.parseInt(match[1], 10);
  }
  return last;
}

export interface ScriptExecution {
  output: string;
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Maps a finished run-script execution onto pass / fail / error.
 * The marker, not the process exit status, decides pass and fail.
 */
export function toRunOutcome(execution: ScriptExecution): RunOutcome {
  const { output, durationMs } = execution;

  if (execution.timedOut) {
    return { status: 'error', diagnostic: 'timeout', exitCode: null, log: output, durationMs };
  }

  const exitCode = extractExitCode(output);
  if (exitCode === null) {
    return {
      status: 'error',
      diagnostic: 'runtime_crash',
      exitCode: null,
      log: output,
      durationMs,
    };
  }

  return { status: exitCode === 0 ? 'pass' : 'fail', exitCode, log: output, durationMs };
}
