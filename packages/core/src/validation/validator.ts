import {
  SandboxRuntimeError,
  logger as defaultLogger,
  redactString,
  type ErrorDiagnostic,
  type Logger,
  type MinimalFixConfig,
  type MinimalFixReport,
  type MutationTrial,
  type PatchKind,
  type RunOutcome,
  type SandboxConfig,
  type ValidationResult,
} from '@envforge/shared';
import { toRunOutcome, type SandboxImage, type SandboxProvider } from '@envforge/exec';
import { classify } from './classify';
import { generateMutations } from './mutations';
import { PATCH_DIR, applyCommand, patchPath, pinCommand } from './patch-apply';

export interface ValidationRequest {
  environmentSpec: string;
  runScript: string;
  testPatch: string;
  fixPatch: string;
  baseCommit: string;
  /** Used in image and container names */
  label: string;
}

export interface ValidatorOptions {
  provider: SandboxProvider;
  sandbox: Pick<SandboxConfig, 'runTimeoutMs' | 'workdir'>;
  minimalFix: MinimalFixConfig;
  logger?: Logger;
}

interface PatchStep {
  kind: PatchKind;
  patch: string;
}

const RUN_SCRIPT_PATH = `${PATCH_DIR}/eval.sh`;

function errorOutcome(
  diagnostic: ErrorDiagnostic,
  log: string,
  durationMs: number,
  patchFailure?: PatchKind,
): RunOutcome {
  return {
    status: 'error',
    diagnostic,
    exitCode: null,
    log: redactString(log).redacted,
    durationMs,
    ...(patchFailure ? { patchFailure } : {}),
  };
}

/**
 * Runs the test before and after the fix, each in a fresh container of the
 * same image, and classifies the pair. A FAIL2PASS pair is then checked
 * against random non-gold edits of the fix.
 */
export class Validator {
  private readonly logger: Logger;

  constructor(private readonly options: ValidatorOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async validate(request: ValidationRequest): Promise<ValidationResult> {
    const started = Date.now();
    const build = await this.options.provider.build({
      environmentSpec: request.environmentSpec,
      label: request.label,
    });

    if (!build.ok) {
      // A build that runs out of time is still an environment problem.
      const outcome = errorOutcome('build_error', build.log, Date.now() - started);
      return {
        classification: 'FAIL2FAIL',
        diagnostic: 'build_error',
        pre: outcome,
        post: outcome,
        minimalFix: { performed: false, passed: true, trials: [] },
      };
    }

    const image = build.image;
    try {
      const test: PatchStep = { kind: 'test', patch: request.testPatch };
      const pre = await this.runPhase(image, request, [test]);
      const post = await this.runPhase(image, request, [
        test,
        { kind: 'fix', patch: request.fixPatch },
      ]);
      const verdict = classify(pre, post);
      await this.logger.debug(
        `${request.label}: pre=${pre.status} post=${post.status} -> ${verdict.classification}`,
      );

      const minimalFix =
        verdict.classification === 'FAIL2PASS'
          ? await this.checkMinimalFix(image, request)
          : { performed: false, passed: true, trials: [] };

      return { ...verdict, pre, post, minimalFix };
    } finally {
      await image.release();
    }
  }

  private async checkMinimalFix(
    image: SandboxImage,
    request: ValidationRequest,
  ): Promise<MinimalFixReport> {
    const { enabled, mutations: count, seed } = this.options.minimalFix;
    const mutations = enabled ? generateMutations(request.fixPatch, count, seed) : [];
    if (mutations.length === 0) {
      return { performed: false, passed: true, trials: [] };
    }

    const trials: MutationTrial[] = [];
    for (const mutation of mutations) {
      const outcome = await this.runPhase(image, request, [
        { kind: 'test', patch: request.testPatch },
        { kind: 'mutation', patch: mutation.patch },
      ]);
      trials.push({
        index: mutation.index,
        files: mutation.files,
        status: outcome.status,
        ...(outcome.status === 'error' ? { diagnostic: outcome.diagnostic } : {}),
      });
    }

    return {
      performed: true,
      passed: trials.every((t) => t.status !== 'pass'),
      trials,
    };
  }

  /**
   * One isolated execution: fresh container, pinned tree, patches in order,
   * then the run script.
   */
  private async runPhase(
    image: SandboxImage,
    request: ValidationRequest,
    patches: PatchStep[],
  ): Promise<RunOutcome> {
    const started = Date.now();
    const elapsed = () => Date.now() - started;

    const session = await image.start().catch((error: unknown) => {
      if (error instanceof SandboxRuntimeError) return error;
      throw error;
    });
    if (session instanceof SandboxRuntimeError) {
      return errorOutcome('runtime_crash', session.message, elapsed());
    }

    try {
      const pin = await session.exec(pinCommand(request.baseCommit));
      if (pin.exitCode !== 0) {
        return errorOutcome(
          'build_error',
          `Failed to reset the working tree to ${request.baseCommit}\n${pin.output}`,
          elapsed(),
        );
      }

      for (const step of patches) {
        if (!step.patch.trim()) continue;
        const file = patchPath(step.kind);
        await session.writeFile(file, step.patch);
        const applied = await session.exec(applyCommand(file));
        if (applied.exitCode !== 0) {
          return errorOutcome(
            'runtime_crash',
            `Failed to apply the ${step.kind} patch (${file})\n${applied.output}`,
            elapsed(),
            step.kind,
          );
        }
      }

      await session.writeFile(RUN_SCRIPT_PATH, request.runScript);
      const run = await session.exec(`bash ${RUN_SCRIPT_PATH}`, {
        timeoutMs: this.options.sandbox.runTimeoutMs,
        workdir: this.options.sandbox.workdir,
      });
      const outcome = toRunOutcome(run);
      return { ...outcome, log: redactString(outcome.log).redacted };
    } catch (error) {
      // Session failures after start count against the candidate
      if (error instanceof SandboxRuntimeError) {
        return errorOutcome('runtime_crash', error.message, elapsed());
      }
      throw error;
    } finally {
      await session.dispose();
    }
  }
}
