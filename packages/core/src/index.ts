export const name = '@envforge/core';

export { ConfigLoader, USER_CONFIG_PATH, REPO_CONFIG_FILE } from './config/loader';
export type { ConfigOptions } from './config/loader';
export { envelope, eventSink } from './events/emit';
export type { EventSink } from './events/emit';
export { STAGE_INPUTS, VALIDATION_INPUTS, invalidatedBy, outputOf, producerOf } from './generation/stages';
export { composeTestPatch, normalizeRunScript, postProcess } from './generation/postprocess';
export { StageDispatcher } from './generation/dispatcher';
export type { DispatchContext, EnsureResult } from './generation/dispatcher';
export { classify, statusOf } from './validation/classify';
export type { Verdict } from './validation/classify';
export { generateMutations } from './validation/mutations';
export type { Mutation } from './validation/mutations';
export { applyCommand, pinCommand, shellQuote } from './validation/patch-apply';
export { Validator } from './validation/validator';
export type { ValidationRequest, ValidatorOptions } from './validation/validator';
export {
  PASS2PASS_HINT,
  WEAK_TEST_HINT,
  outcomeLabel,
  route,
  routeGenerationFailure,
} from './feedback/router';
export type { RetryDecision, RouteDecision, RouterOptions } from './feedback/router';
export { Orchestrator } from './pipeline/orchestrator';
export type { InstanceValidator, OrchestratorOptions, ProcessOutcome } from './pipeline/orchestrator';
export { summarizeValidation } from './pipeline/artifacts';
export { ResultStore } from './results/store';
export { filterTasks, loadTasks, parseTask, parseTasks, readTaskList } from './tasks/loader';
export type { TaskFilter } from './tasks/loader';
export { runPool } from './batch/pool';
export { BatchRunner, batchExitCode, createRunId } from './batch/runner';
export type { BatchRunnerOptions, BatchSummary, InstanceSummary } from './batch/runner';
