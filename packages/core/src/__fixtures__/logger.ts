import type { Logger, PipelineEvent } from '@envforge/shared';

/** Collects everything logged so tests can assert on events and warnings */
export class RecordingLogger implements Logger {
  readonly events: PipelineEvent[] = [];
  readonly messages: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: Error[] = [];

  log(event: PipelineEvent): void {
    this.events.push(event);
  }

  trace(event: PipelineEvent, message: string): void {
    this.events.push(event);
    this.messages.push(message);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(error: Error): void {
    this.errors.push(error);
  }

  child(): Logger {
    return this;
  }

  eventTypes(): string[] {
    return this.events.map((e) => e.type);
  }
}
