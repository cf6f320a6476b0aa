import type { Classification, Diagnostic, RunOutcome } from '@envforge/shared';

export interface Verdict {
  classification: Classification;
  diagnostic: Diagnostic;
}

/**
 * Classifies a pre/post pair. An error on either side is FAIL2FAIL carrying
 * that run's diagnostic; the pre run's error is reported when both errored.
 */
export function classify(pre: RunOutcome, post: RunOutcome): Verdict {
  if (pre.status === 'error') {
    return { classification: 'FAIL2FAIL', diagnostic: pre.diagnostic };
  }
  if (post.status === 'error') {
    return { classification: 'FAIL2FAIL', diagnostic: post.diagnostic };
  }
  if (pre.status === 'fail') {
    return post.status === 'pass'
      ? { classification: 'FAIL2PASS', diagnostic: 'none' }
      : { classification: 'FAIL2FAIL', diagnostic: 'assertion' };
  }
  return post.status === 'pass'
    ? { classification: 'PASS2PASS', diagnostic: 'none' }
    : { classification: 'PASS2FAIL', diagnostic: 'none' };
}

/** Maps a single exit code onto a run status, for saved logs */
export function statusOf(exitCode: number | null): 'pass' | 'fail' | 'error' {
  if (exitCode === null) return 'error';
  return exitCode === 0 ? 'pass' : 'fail';
}
