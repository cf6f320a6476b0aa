import {
  ConfigError,
  extractJsonObject,
  logger as defaultLogger,
  tailLines,
  type ArtifactGenerator,
  type GenerationRequest,
  type GeneratorOutcome,
  type Logger,
  type Stage,
} from '@envforge/shared';
import { SubprocessRunner, type CommandRunner } from '@envforge/exec';
import { GeneratorResponseSchema, encodeRequest } from '../protocol';

export interface CommandGeneratorConfig {
  /** Executable and leading arguments; the stage name is appended */
  command: readonly string[];
  timeoutMs: number;
  envAllowlist?: readonly string[];
  cwd?: string;
}

export interface CommandGeneratorOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

const STDERR_TAIL_LINES = 20;

/**
 * Generates artifacts by running an external program once per request.
 * The request goes to stdin as JSON; the program answers with
 * `{ "ok": true, "artifact": "..." }` or `{ "ok": false, "reason": "..." }`.
 */
export class CommandGenerator implements ArtifactGenerator {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(
    readonly stage: Stage,
    private readonly config: CommandGeneratorConfig,
    options: CommandGeneratorOptions = {},
  ) {
    if (config.command.length === 0) {
      throw new ConfigError('generators.command.command must name an executable');
    }
    this.runner = options.runner ?? new SubprocessRunner();
    this.logger = options.logger ?? defaultLogger;
  }

  async generate(request: GenerationRequest): Promise<GeneratorOutcome> {
    const [bin, ...args] = this.config.command;
    // A missing binary surfaces as a ProcessError from the runner: it affects every instance.
    const result = await this.runner.run({
      bin,
      args: [...args, this.stage],
      input: encodeRequest(this.stage, request),
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
      envAllowlist: this.config.envAllowlist,
    });

    if (result.stderr.trim()) {
      await this.logger.debug(`${this.stage} backend stderr:\n${tailLines(result.stderr, STDERR_TAIL_LINES)}`);
    }
    if (result.timedOut) {
      return { ok: false, reason: `backend timed out after ${this.config.timeoutMs}ms` };
    }
    if (result.exitCode !== 0) {
      const stderr = tailLines(result.stderr.trim(), STDERR_TAIL_LINES);
      return {
        ok: false,
        reason: `backend exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
      };
    }

    let raw: unknown;
    try {
      raw = extractJsonObject(result.stdout, `${this.stage} backend`);
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
    const parsed = GeneratorResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return {
        ok: false,
        reason: `malformed ${this.stage} backend response: ${issue.path.join('.') || '(root)'} ${issue.message}`,
      };
    }
    return parsed.data;
  }
}
