import type { Stage } from './artifacts';
import type { Classification, Diagnostic } from './validation';
import type { FailureReason } from './results';

/**
 * Base interface for all pipeline events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the batch run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export interface InstanceStarted extends BaseEvent {
  type: 'InstanceStarted';
  payload: {
    instanceId: string;
    repo: string;
  };
}

export interface InstanceSkipped extends BaseEvent {
  type: 'InstanceSkipped';
  payload: {
    instanceId: string;
    reason: string;
  };
}

export interface MemoryPoolHit extends BaseEvent {
  type: 'MemoryPoolHit';
  payload: {
    instanceId: string;
    fingerprint: string;
    sourceInstanceId: string;
  };
}

export interface StageStarted extends BaseEvent {
  type: 'StageStarted';
  payload: {
    instanceId: string;
    stage: Stage;
    round: number;
  };
}

export interface StageCompleted extends BaseEvent {
  type: 'StageCompleted';
  payload: {
    instanceId: string;
    stage: Stage;
    round: number;
    /** Size of the produced artifact in characters */
    size: number;
  };
}

export interface StageFailed extends BaseEvent {
  type: 'StageFailed';
  payload: {
    instanceId: string;
    stage: Stage;
    round: number;
    reason: string;
  };
}

export interface ValidationCompleted extends BaseEvent {
  type: 'ValidationCompleted';
  payload: {
    instanceId: string;
    round: number;
    classification: Classification;
    diagnostic: Diagnostic;
    preExitCode: number | null;
    postExitCode: number | null;
    weakTest: boolean;
  };
}

export interface RetryRouted extends BaseEvent {
  type: 'RetryRouted';
  payload: {
    instanceId: string;
    round: number;
    stage: Stage;
    hint: string;
  };
}

export interface InstanceAccepted extends BaseEvent {
  type: 'InstanceAccepted';
  payload: {
    instanceId: string;
    rounds: number;
  };
}

export interface InstanceFailed extends BaseEvent {
  type: 'InstanceFailed';
  payload: {
    instanceId: string;
    rounds: number;
    reason: FailureReason;
  };
}

export type PipelineEvent =
  | InstanceStarted
  | InstanceSkipped
  | MemoryPoolHit
  | StageStarted
  | StageCompleted
  | StageFailed
  | ValidationCompleted
  | RetryRouted
  | InstanceAccepted
  | InstanceFailed;

export type PipelineEventType = PipelineEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;
