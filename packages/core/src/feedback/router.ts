import {
  excerptLog,
  type ConversationEntry,
  type ConversationState,
  type RunOutcome,
  type Stage,
  type ValidationResult,
} from '@envforge/shared';

export type RouteDecision =
  | { action: 'accept' }
  | { action: 'retry'; stage: Stage; hint: string }
  | { action: 'reject'; reason: 'Regression' };

export type RetryDecision = Extract<RouteDecision, { action: 'retry' }>;

export interface RouterOptions {
  /** Lines of log kept in a hint */
  excerptLines: number;
}

export const WEAK_TEST_HINT = 'test passes under unrelated edits; tighten assertions';
export const PASS2PASS_HINT = 'test does not fail before the fix; exercise the buggy behavior';

/** Consecutive assertion failures on one context before the context itself is redone */
const CONTEXT_ESCALATION_AFTER = 2;

/**
 * Short label recorded in the conversation history for a validation.
 */
export function outcomeLabel(result: ValidationResult): string {
  if (result.classification === 'FAIL2PASS' && !result.minimalFix.passed) {
    return 'FAIL2PASS/WeakTest';
  }
  return `${result.classification}/${result.diagnostic}`;
}

function erroredRun(
  result: ValidationResult,
): Extract<RunOutcome, { status: 'error' }> | undefined {
  if (result.pre.status === 'error') return result.pre;
  if (result.post.status === 'error') return result.post;
  return undefined;
}

/**
 * Counts assertion-level failures since the context was last produced.
 */
function assertionStreak(history: readonly ConversationEntry[]): number {
  let streak = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    const entry = history[i];
    if (entry.stage === 'context') break;
    if (entry.stage !== 'validate') continue;
    if (entry.outcome !== 'FAIL2FAIL/assertion') break;
    streak += 1;
  }
  return streak;
}

/**
 * Decides what to do after a validation. `state.history` holds the entries of
 * earlier rounds; the current validation is not in it yet.
 */
export function route(
  result: ValidationResult,
  state: ConversationState,
  options: RouterOptions,
): RouteDecision {
  const excerpt = (log: string) => excerptLog(log, options.excerptLines);

  switch (result.classification) {
    case 'FAIL2PASS':
      return result.minimalFix.passed
        ? { action: 'accept' }
        : { action: 'retry', stage: 'test', hint: WEAK_TEST_HINT };

    case 'PASS2PASS':
      return { action: 'retry', stage: 'test', hint: PASS2PASS_HINT };

    case 'PASS2FAIL':
      return { action: 'reject', reason: 'Regression' };

    case 'FAIL2FAIL':
      break;
  }

  const errored = erroredRun(result);
  if (errored) {
    if (errored.patchFailure === 'test') {
      return {
        action: 'retry',
        stage: 'test',
        hint: `The test patch did not apply to the base commit.\n${excerpt(errored.log)}`,
      };
    }
    if (errored.patchFailure === 'fix') {
      // The fix is never regenerated; the checkout is.
      return {
        action: 'retry',
        stage: 'env',
        hint: `The fix patch did not apply inside the environment.\n${excerpt(errored.log)}`,
      };
    }
    if (errored.diagnostic === 'build_error') {
      return { action: 'retry', stage: 'env', hint: excerpt(errored.log) };
    }
    return { action: 'retry', stage: 'run', hint: excerpt(errored.log) };
  }

  if (assertionStreak(state.history) >= CONTEXT_ESCALATION_AFTER) {
    return {
      action: 'retry',
      stage: 'context',
      hint: `Tests kept failing after the fix; gather the code paths the fix changes.\n${excerpt(result.post.log)}`,
    };
  }
  return { action: 'retry', stage: 'test', hint: excerpt(result.post.log) };
}

/**
 * Retries a stage whose generator produced nothing usable.
 */
export function routeGenerationFailure(stage: Stage, reason: string): RetryDecision {
  return {
    action: 'retry',
    stage,
    hint: `previous attempt produced no usable artifact: ${reason}`,
  };
}
