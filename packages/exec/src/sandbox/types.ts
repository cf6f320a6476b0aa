export interface BuildRequest {
  /** Dockerfile text */
  environmentSpec: string;
  /** Human-readable label used in image and container names */
  label: string;
}

export type BuildOutcome =
  | { ok: true; image: SandboxImage }
  | { ok: false; reason: 'build_error' | 'timeout'; log: string };

/**
 * A built environment. Every `start()` yields an isolated container with no
 * state carried over from earlier sessions.
 */
export interface SandboxImage {
  readonly id: string;
  /** @throws SandboxRuntimeError when the container cannot be started */
  start(): Promise<SandboxSession>;
  /** Drops this holder's claim on the image; the image is removed once unclaimed unless kept */
  release(): Promise<void>;
}

export interface ExecOptions {
  timeoutMs?: number;
  /** Defaults to the sandbox workdir */
  workdir?: string;
}

export interface ExecResult {
  exitCode: number;
  /** stdout and stderr, interleaved */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface SandboxSession {
  readonly id: string;
  writeFile(path: string, content: string): Promise<void>;
  /** Runs a bash command line inside the container */
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;
  /** Removes the container; safe to call more than once */
  dispose(): Promise<void>;
}

export interface SandboxProvider {
  /** @throws InfrastructureError when the backend is unreachable */
  ping(): Promise<void>;
  build(request: BuildRequest): Promise<BuildOutcome>;
}
