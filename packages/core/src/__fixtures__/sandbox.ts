import { SandboxRuntimeError, type PatchKind } from '@envforge/shared';
import type {
  BuildOutcome,
  BuildRequest,
  ExecResult,
  SandboxImage,
  SandboxProvider,
  SandboxSession,
} from '@envforge/exec';

/** What the run script prints: an exit code, a hang, or no marker at all */
export type ScriptedRun = number | 'timeout' | 'crash';

export interface PhaseScript {
  pre: ScriptedRun;
  post: ScriptedRun;
  /** Result under a random edit of the fix; defaults to the pre result */
  mutation?: ScriptedRun;
}

export interface FakeSandboxOptions {
  /** Decides the run result from the environment spec being validated */
  script: (environmentSpec: string) => PhaseScript;
  buildFailure?: (request: BuildRequest) => Extract<BuildOutcome, { ok: false }> | undefined;
  applyFails?: (kind: PatchKind) => boolean;
  pinFails?: boolean;
  startFails?: boolean;
  /** Paths whose write throws as if the container had gone away */
  writeFails?: (path: string) => boolean;
  /** Printed by the run script ahead of the exit marker */
  runOutput?: string;
}

export interface SessionRecord {
  files: Map<string, string>;
  commands: string[];
  applied: PatchKind[];
  disposed: boolean;
}

function scripted(run: ScriptedRun, prefix = ''): ExecResult {
  if (run === 'timeout') {
    return { exitCode: 137, output: 'collecting tests...\n', timedOut: true, durationMs: 5 };
  }
  if (run === 'crash') {
    return { exitCode: 139, output: 'Segmentation fault\n', timedOut: false, durationMs: 5 };
  }
  return {
    exitCode: run,
    output: `${prefix}ran tests\nEXIT_CODE=${run}\n`,
    timedOut: false,
    durationMs: 5,
  };
}

/**
 * In-process stand-in for a container backend. Patch application and the
 * run script are simulated; which patches were applied decides the result.
 */
export class FakeSandboxProvider implements SandboxProvider {
  readonly builds: BuildRequest[] = [];
  readonly sessions: SessionRecord[] = [];
  released = 0;
  pings = 0;

  constructor(private readonly options: FakeSandboxOptions) {}

  async ping(): Promise<void> {
    this.pings += 1;
  }

  async build(request: BuildRequest): Promise<BuildOutcome> {
    this.builds.push(request);
    const failure = this.options.buildFailure?.(request);
    if (failure) return failure;

    const script = this.options.script(request.environmentSpec);
    const image: SandboxImage = {
      id: `fake-image-${this.builds.length}`,
      start: async () => {
        if (this.options.startFails) {
          throw new SandboxRuntimeError('container exited immediately');
        }
        return this.session(script);
      },
      release: async () => {
        this.released += 1;
      },
    };
    return { ok: true, image };
  }

  private session(script: PhaseScript): SandboxSession {
    const record: SessionRecord = { files: new Map(), commands: [], applied: [], disposed: false };
    this.sessions.push(record);
    const options = this.options;

    return {
      id: `fake-session-${this.sessions.length}`,
      async writeFile(path: string, content: string) {
        if (options.writeFails?.(path)) {
          throw new SandboxRuntimeError(`Failed to write ${path}: container is not running`);
        }
        record.files.set(path, content);
      },
      async exec(command: string): Promise<ExecResult> {
        record.commands.push(command);
        if (command.startsWith('git reset')) {
          return options.pinFails
            ? { exitCode: 128, output: 'fatal: bad revision\n', timedOut: false, durationMs: 1 }
            : { exitCode: 0, output: '', timedOut: false, durationMs: 1 };
        }
        const patch = /\/envforge\/(test|fix|mutation)\.patch/.exec(command);
        if (patch) {
          const kind = patch[1] === 'test' ? 'test' : patch[1] === 'fix' ? 'fix' : 'mutation';
          if (options.applyFails?.(kind)) {
            return { exitCode: 1, output: 'error: patch failed\n', timedOut: false, durationMs: 1 };
          }
          record.applied.push(kind);
          return { exitCode: 0, output: `Applied patch ${kind}\n`, timedOut: false, durationMs: 1 };
        }
        if (command.startsWith('bash /envforge/eval.sh')) {
          const prefix = options.runOutput;
          if (record.applied.includes('fix')) return scripted(script.post, prefix);
          if (record.applied.includes('mutation')) {
            return scripted(script.mutation ?? script.pre, prefix);
          }
          return scripted(script.pre, prefix);
        }
        return { exitCode: 0, output: '', timedOut: false, durationMs: 1 };
      },
      async dispose() {
        record.disposed = true;
      },
    };
  }
}
