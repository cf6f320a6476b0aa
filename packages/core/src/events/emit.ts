import {
  EVENT_SCHEMA_VERSION,
  type BaseEvent,
  type Logger,
  type PipelineEvent,
} from '@envforge/shared';

/** Sends a pipeline event, optionally with a one-line human summary */
export type EventSink = (event: PipelineEvent, message?: string) => Promise<void>;

export function envelope(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}

export function eventSink(logger: Logger): EventSink {
  return async (event, message) => {
    if (message) {
      await logger.trace(event, message);
    } else {
      await logger.log(event);
    }
  };
}
