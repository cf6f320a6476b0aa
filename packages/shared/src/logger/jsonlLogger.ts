import * as fs from 'fs/promises';
import { dirname } from 'path';
import type { PipelineEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';
import { formatPrefix } from './prefix';

/**
 * Appends redacted events to a JSONL trace file and prints messages to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: { verbose?: boolean } = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = options.verbose ?? false;
  }

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Trace output is best-effort: a full disk must not fail the instance.
      console.error(`Failed to write to trace file at ${this.filePath}`, error);
    }
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    console.log(formatPrefix(this.bindings, message));
    await this.log(event);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(formatPrefix(this.bindings, message));
    }
  }

  info(message: string): void {
    console.info(formatPrefix(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, { verbose: this.verbose });
  }
}
