import type { MemoryPool, MemoryPoolEntry } from './types';

/**
 * Process-local pool. Commits swap a frozen entry into the map in one step,
 * so concurrent lookups see the old or the new entry and never a mix.
 */
export function createInMemoryMemoryPool(): MemoryPool {
  const entries = new Map<string, MemoryPoolEntry>();

  const byNewest = (a: MemoryPoolEntry, b: MemoryPoolEntry) =>
    b.updatedAt.localeCompare(a.updatedAt);

  return {
    lookup: (fingerprint) => entries.get(fingerprint),
    commit: (entry) => {
      entries.set(entry.fingerprint, Object.freeze({ ...entry }));
    },
    listByRepo: (repo) => [...entries.values()].filter((e) => e.repo === repo).sort(byNewest),
    list: () => [...entries.values()].sort(byNewest),
    clear: () => {
      const count = entries.size;
      entries.clear();
      return count;
    },
    close: () => undefined,
  };
}
