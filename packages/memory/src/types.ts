/**
 * A validated environment, reusable by any instance with the same fingerprint.
 * Entries are immutable once committed; a commit replaces the whole entry.
 */
export interface MemoryPoolEntry {
  readonly fingerprint: string;
  readonly repo: string;
  /** Version string of the instance the entry came from */
  readonly version: string;
  readonly environmentSpec: string;
  /** Run script of the source instance; a template for other instances */
  readonly runScript: string;
  readonly sourceInstanceId: string;
  readonly updatedAt: string;
}

export interface MemoryPool {
  lookup(fingerprint: string): MemoryPoolEntry | undefined;
  /** Inserts or overwrites the entry for `entry.fingerprint` (last writer wins) */
  commit(entry: MemoryPoolEntry): void;
  /** Entries for one repository, newest first */
  listByRepo(repo: string): MemoryPoolEntry[];
  list(): MemoryPoolEntry[];
  clear(): number;
  close(): void;
}
