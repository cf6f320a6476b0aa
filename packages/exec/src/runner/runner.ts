import { spawn } from 'child_process';
import { ProcessError } from '@envforge/shared';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  // Sending a signal to the negative PID kills the entire process group.
  // This requires the child process to have been spawned in detached mode.
  try {
    process.kill(-pid, signal);
  } catch {
    // Already exited.
  }
}

// Minimal env vars that are safe and commonly needed by CLIs.
// Anything else must be allowlisted per request.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'XDG_CONFIG_HOME',
  'XDG_CACHE_HOME',
  'XDG_DATA_HOME',
  'DOCKER_HOST',
  'DOCKER_CONFIG',
  'DOCKER_CONTEXT',
];

export function getSafeEnv(
  baseEnv: NodeJS.ProcessEnv,
  envAllowlist: readonly string[] = [],
  requestEnv: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  if (baseEnv.PATH) {
    safeEnv.PATH = baseEnv.PATH;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...envAllowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  return { ...safeEnv, ...requestEnv };
}

export interface CommandRequest {
  bin: string;
  args: string[];
  /** Written to stdin, which is then closed */
  input?: string;
  cwd?: string;
  timeoutMs: number;
  /** Combined stdout+stderr cap; output beyond it is dropped and the process killed */
  maxOutputBytes?: number;
  /** Extra variables passed on top of the baseline environment */
  env?: Record<string, string>;
  /** Names copied from the parent environment on top of the baseline */
  envAllowlist?: readonly string[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  truncated: boolean;
}

/**
 * Runs an argument vector without a shell. Implementations must resolve with
 * a result for any process that started, and reject with ProcessError only
 * when the process could not be started.
 */
export interface CommandRunner {
  run(req: CommandRequest): Promise<CommandResult>;
}

const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
const KILL_GRACE_MS = 5_000;

export class SubprocessRunner implements CommandRunner {
  constructor(private readonly baseEnv: NodeJS.ProcessEnv = process.env) {}

  run(req: CommandRequest): Promise<CommandResult> {
    const env = getSafeEnv(this.baseEnv, req.envAllowlist, req.env);
    const maxOutputBytes = req.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let outputBytes = 0;
    let truncated = false;
    let timedOut = false;

    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(req.bin, req.args, {
        cwd: req.cwd,
        env,
        stdio: [req.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        detached: true,
      });

      const terminate = () => {
        if (!child.pid) return;
        killProcessTree(child.pid, 'SIGTERM');
        const pid = child.pid;
        killTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), KILL_GRACE_MS);
      };

      const timeoutTimer = setTimeout(() => {
        if (!settled) {
          timedOut = true;
          terminate();
        }
      }, req.timeoutMs);

      const collect = (target: Buffer[]) => (chunk: Buffer) => {
        if (truncated) return;
        const room = maxOutputBytes - outputBytes;
        if (chunk.length > room) {
          truncated = true;
          target.push(chunk.subarray(0, Math.max(0, room)));
          target.push(Buffer.from('\n[Output truncated due to limit]\n'));
          outputBytes = maxOutputBytes;
          terminate();
          return;
        }
        outputBytes += chunk.length;
        target.push(chunk);
      };

      child.stdout?.on('data', collect(stdoutChunks));
      child.stderr?.on('data', collect(stderrChunks));

      if (req.input !== undefined && child.stdin) {
        // EPIPE when the process exits without reading stdin is not an error here.
        child.stdin.on('error', () => undefined);
        child.stdin.end(req.input);
      }

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        reject(
          new ProcessError(`Failed to start ${req.bin}: ${err.message}`, {
            cause: err,
            details: { bin: req.bin },
          }),
        );
      });

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);

        resolve({
          exitCode: code ?? -1,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
          durationMs: Date.now() - start,
          timedOut,
          truncated,
        });
      });
    });
  }
}
