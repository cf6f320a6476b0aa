export type RunStatus = 'pass' | 'fail' | 'error';

/** Why a run did not produce a usable verdict */
export type ErrorDiagnostic = 'build_error' | 'timeout' | 'runtime_crash';

/** Which patch a run applies: the test patch, the fix, or a random edit of the fix */
export type PatchKind = 'test' | 'fix' | 'mutation';

export type RunOutcome =
  | {
      status: 'pass' | 'fail';
      exitCode: number;
      log: string;
      durationMs: number;
    }
  | {
      status: 'error';
      diagnostic: ErrorDiagnostic;
      exitCode: number | null;
      /** Set when the run never started because a patch did not apply */
      patchFailure?: PatchKind;
      log: string;
      durationMs: number;
    };

export type Classification = 'FAIL2PASS' | 'PASS2PASS' | 'FAIL2FAIL' | 'PASS2FAIL';

export type Diagnostic = ErrorDiagnostic | 'assertion' | 'none';

export interface MutationTrial {
  index: number;
  /** Files the random edit touched */
  files: string[];
  status: RunStatus;
  diagnostic?: ErrorDiagnostic;
}

export interface MinimalFixReport {
  /** False when the check was skipped (disabled, no hunks, or not FAIL2PASS) */
  performed: boolean;
  /** True unless some random edit made the test pass */
  passed: boolean;
  trials: MutationTrial[];
}

export interface ValidationResult {
  classification: Classification;
  diagnostic: Diagnostic;
  pre: RunOutcome;
  post: RunOutcome;
  minimalFix: MinimalFixReport;
}
