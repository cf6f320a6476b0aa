import { describe, it, expect } from 'vitest';
import { RecordingLogger } from '../__fixtures__/logger';
import { envelope, eventSink } from './emit';

describe('eventSink', () => {
  it('traces events that carry a message and logs the rest', async () => {
    const logger = new RecordingLogger();
    const emit = eventSink(logger);

    await emit({
      ...envelope('run-1'),
      type: 'InstanceStarted',
      payload: { instanceId: 'acme__widgets-1', repo: 'acme/widgets' },
    });
    await emit(
      {
        ...envelope('run-1'),
        type: 'InstanceAccepted',
        payload: { instanceId: 'acme__widgets-1', rounds: 2 },
      },
      'accepted after 2 rounds',
    );

    expect(logger.eventTypes()).toEqual(['InstanceStarted', 'InstanceAccepted']);
    expect(logger.messages).toEqual(['accepted after 2 rounds']);
    expect(logger.events[0].schemaVersion).toBe(1);
    expect(logger.events[0].runId).toBe('run-1');
  });
});
