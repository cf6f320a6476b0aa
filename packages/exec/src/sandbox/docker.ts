import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import { dir } from 'tmp-promise';
import {
  InfrastructureError,
  ProcessError,
  SandboxRuntimeError,
  redactString,
  slugify,
  type Logger,
  type SandboxConfig,
} from '@envforge/shared';
import { SubprocessRunner, type CommandRequest, type CommandResult, type CommandRunner } from '../runner/runner';
import { prepareDockerfile } from './dockerfile';
import type {
  BuildOutcome,
  BuildRequest,
  ExecOptions,
  ExecResult,
  SandboxImage,
  SandboxProvider,
  SandboxSession,
} from './types';

/** Label on every container we create, for manual cleanup queries */
export const CONTAINER_LABEL = 'com.envforge.app=true';

const PING_TIMEOUT_MS = 30_000;
const CONTROL_TIMEOUT_MS = 120_000;

export type DockerSandboxConfig = Pick<
  SandboxConfig,
  | 'dockerPath'
  | 'platform'
  | 'buildTimeoutMs'
  | 'runTimeoutMs'
  | 'keepImages'
  | 'maxOutputBytes'
  | 'workdir'
  | 'buildArgEnv'
>;

export interface DockerSandboxProviderOptions {
  config: DockerSandboxConfig;
  runner?: CommandRunner;
  /** Source of build-arg values; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

type ImageBuild = { ok: true } | { ok: false; reason: 'build_error' | 'timeout'; log: string };

interface ImageEntry {
  tag: string;
  refs: number;
  ready: Promise<ImageBuild>;
  /** Set once the last holder released the image; the entry leaves the map when it settles */
  removing?: Promise<void>;
}

function combinedOutput(result: CommandResult): string {
  if (!result.stderr) return result.stdout;
  if (!result.stdout) return result.stderr;
  return `${result.stdout}\n${result.stderr}`;
}

/**
 * Sandbox backed by the Docker CLI. Images are keyed by a hash of the
 * prepared Dockerfile and shared by every caller that builds the same text;
 * containers are never shared.
 */
export class DockerSandboxProvider implements SandboxProvider {
  private readonly config: DockerSandboxConfig;
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger?: Logger;
  private readonly images = new Map<string, ImageEntry>();

  constructor(options: DockerSandboxProviderOptions) {
    this.config = options.config;
    this.runner = options.runner ?? new SubprocessRunner();
    this.env = options.env ?? process.env;
    this.logger = options.logger;
  }

  async ping(): Promise<void> {
    const result = await this.docker(['version', '--format', '{{.Server.Version}}'], {
      timeoutMs: PING_TIMEOUT_MS,
    });
    if (result.exitCode !== 0 || result.timedOut) {
      throw new InfrastructureError(
        `Docker daemon is not reachable: ${result.stderr.trim() || 'no response'}`,
      );
    }
    await this.logger?.debug(`Docker server ${result.stdout.trim()}`);
  }

  async build(request: BuildRequest): Promise<BuildOutcome> {
    const buildArgs = this.config.buildArgEnv.filter((name) => this.env[name]);
    const dockerfile = prepareDockerfile(request.environmentSpec, buildArgs);
    const hash = createHash('sha256').update(dockerfile).digest('hex').slice(0, 12);

    for (;;) {
      let entry = this.images.get(hash);
      if (entry?.removing) {
        await entry.removing;
        continue;
      }
      if (!entry) {
        const tag = `envforge-env:${hash}`;
        entry = { tag, refs: 0, ready: this.buildImage(dockerfile, tag, buildArgs) };
        this.images.set(hash, entry);
      }

      const built = await entry.ready;
      if (!built.ok) {
        if (this.images.get(hash) === entry) {
          this.images.delete(hash);
        }
        return built;
      }
      // The last holder let go while we waited; build again once it is gone
      if (entry.removing) continue;

      entry.refs += 1;
      return { ok: true, image: new DockerImage(this, hash, entry.tag, request.label) };
    }
  }

  /** @internal */
  async releaseImage(hash: string): Promise<void> {
    const entry = this.images.get(hash);
    if (!entry) return;
    entry.refs -= 1;
    if (entry.refs > 0 || this.config.keepImages) return;

    const removed = entry;
    removed.removing = this.removeImage(removed.tag).finally(() => {
      if (this.images.get(hash) === removed) {
        this.images.delete(hash);
      }
    });
    await removed.removing;
  }

  private async removeImage(tag: string): Promise<void> {
    const result = await this.docker(['rmi', '-f', tag], { timeoutMs: CONTROL_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      await this.logger?.warn(`Failed to remove image ${tag}: ${result.stderr.trim()}`);
    }
  }

  /** @internal */
  async startContainer(tag: string, label: string): Promise<DockerSession> {
    const name = `envforge-${slugify(label, 40)}-${randomUUID().slice(0, 8)}`;
    const create = await this.docker(
      [
        'create',
        '--init',
        '--platform',
        this.config.platform,
        '--name',
        name,
        '--label',
        CONTAINER_LABEL,
        '-w',
        this.config.workdir,
        tag,
        'tail',
        '-f',
        '/dev/null',
      ],
      { timeoutMs: CONTROL_TIMEOUT_MS },
    );
    if (create.exitCode !== 0) {
      throw new SandboxRuntimeError(`docker create failed: ${combinedOutput(create).trim()}`);
    }

    const session = new DockerSession(this, name, this.config, this.logger);
    const start = await this.docker(['start', name], { timeoutMs: CONTROL_TIMEOUT_MS });
    if (start.exitCode !== 0) {
      await session.dispose();
      throw new SandboxRuntimeError(`docker start failed: ${combinedOutput(start).trim()}`);
    }
    return session;
  }

  /**
   * Runs the Docker CLI. A missing binary is an infrastructure failure, not
   * an instance failure.
   * @internal
   */
  async docker(
    args: string[],
    options: Omit<CommandRequest, 'bin' | 'args'>,
  ): Promise<CommandResult> {
    try {
      return await this.runner.run({
        bin: this.config.dockerPath,
        args,
        maxOutputBytes: this.config.maxOutputBytes,
        ...options,
      });
    } catch (err) {
      if (err instanceof ProcessError) {
        throw new InfrastructureError(`Docker CLI unavailable: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  private async buildImage(dockerfile: string, tag: string, buildArgs: string[]): Promise<ImageBuild> {
    const inspect = await this.docker(['image', 'inspect', tag], { timeoutMs: PING_TIMEOUT_MS });
    if (inspect.exitCode === 0) {
      await this.logger?.debug(`Reusing image ${tag}`);
      return { ok: true };
    }

    const context = await dir({ unsafeCleanup: true });
    try {
      await fs.writeFile(join(context.path, 'Dockerfile'), dockerfile, 'utf8');
      const env: Record<string, string> = {};
      for (const name of buildArgs) {
        const value = this.env[name];
        if (value) env[name] = value;
      }

      await this.logger?.debug(`Building image ${tag}`);
      const result = await this.docker(
        [
          'build',
          '--platform',
          this.config.platform,
          '-t',
          tag,
          ...buildArgs.flatMap((name) => ['--build-arg', name]),
          context.path,
        ],
        { timeoutMs: this.config.buildTimeoutMs, env },
      );

      const log = redactString(combinedOutput(result)).redacted;
      if (result.timedOut) {
        return { ok: false, reason: 'timeout', log };
      }
      if (result.exitCode !== 0) {
        return { ok: false, reason: 'build_error', log };
      }
      return { ok: true };
    } finally {
      await context.cleanup();
    }
  }
}

class DockerImage implements SandboxImage {
  private released = false;

  constructor(
    private readonly provider: DockerSandboxProvider,
    private readonly hash: string,
    readonly id: string,
    private readonly label: string,
  ) {}

  start(): Promise<SandboxSession> {
    return this.provider.startContainer(this.id, this.label);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.provider.releaseImage(this.hash);
  }
}

export class DockerSession implements SandboxSession {
  private disposed = false;

  constructor(
    private readonly provider: DockerSandboxProvider,
    readonly id: string,
    private readonly config: DockerSandboxConfig,
    private readonly logger?: Logger,
  ) {}

  async writeFile(path: string, content: string): Promise<void> {
    const result = await this.provider.docker(
      ['exec', '-i', this.id, 'sh', '-c', 'mkdir -p "$(dirname "$1")" && cat > "$1"', 'sh', path],
      { input: content, timeoutMs: CONTROL_TIMEOUT_MS },
    );
    if (result.exitCode !== 0) {
      throw new SandboxRuntimeError(`Failed to write ${path}: ${combinedOutput(result).trim()}`);
    }
  }

  async exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const result = await this.provider.docker(
      ['exec', '-w', options.workdir ?? this.config.workdir, this.id, 'bash', '-c', `exec 2>&1\n${command}`],
      { timeoutMs: options.timeoutMs ?? this.config.runTimeoutMs },
    );
    return {
      exitCode: result.exitCode,
      output: combinedOutput(result),
      timedOut: result.timedOut,
      durationMs: result.durationMs,
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    const result = await this.provider.docker(['rm', '-f', this.id], {
      timeoutMs: CONTROL_TIMEOUT_MS,
    });
    if (result.exitCode !== 0) {
      await this.logger?.warn(`Failed to remove container ${this.id}: ${result.stderr.trim()}`);
    }
  }
}
