import { promises as fs } from 'fs';
import {
  ResultRecordSchema,
  ResultStoreError,
  ensureDir,
  logger as defaultLogger,
  type Logger,
  type ResultRecord,
} from '@envforge/shared';

/**
 * Append-only JSONL store of per-instance results. The newest record for an
 * instance wins; nothing is ever rewritten.
 */
export class ResultStore {
  private readonly records: ResultRecord[] = [];
  private readonly latestById = new Map<string, ResultRecord>();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Reads existing records. Lines that do not parse (typically the last line
   * of a run that was killed mid-write) are skipped with a warning.
   */
  async load(): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw new ResultStoreError(`Failed to read result store at ${this.filePath}`, {
        cause: error,
      });
    }

    const lines = text.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      const record = parseRecord(line);
      if (!record) {
        void this.logger.warn(
          `Skipping malformed result record at ${this.filePath}:${index + 1}`,
        );
        return;
      }
      this.remember(record);
    });
  }

  latest(instanceId: string): ResultRecord | undefined {
    return this.latestById.get(instanceId);
  }

  all(): readonly ResultRecord[] {
    return this.records;
  }

  /** Latest record per instance, accepted only */
  accepted(): ResultRecord[] {
    return [...this.latestById.values()].filter((r) => r.status === 'accepted');
  }

  /**
   * Appends one record as a single line. Concurrent callers are serialized so
   * lines never interleave.
   */
  append(record: ResultRecord): Promise<void> {
    const write = this.queue.then(async () => {
      try {
        await ensureDir(this.filePath);
        await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf8');
      } catch (error) {
        throw new ResultStoreError(`Failed to append to result store at ${this.filePath}`, {
          cause: error,
          details: { instanceId: record.instanceId },
        });
      }
      this.remember(record);
    });
    // A failed append must not wedge the queue for later writers.
    this.queue = write.catch(() => undefined);
    return write;
  }

  private remember(record: ResultRecord): void {
    this.records.push(record);
    this.latestById.set(record.instanceId, record);
  }
}

function parseRecord(line: string): ResultRecord | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = ResultRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}
