import type { ResultRecord } from '@envforge/shared';
import type { MemoryPool, MemoryPoolEntry } from './types';

function versionParts(version: string): number[] {
  return (version.match(/\d+/g) ?? []).slice(0, 3).map(Number);
}

function versionDistance(a: string, b: string): number {
  const pa = versionParts(a);
  const pb = versionParts(b);
  let distance = 0;
  for (let i = 0; i < 3; i++) {
    distance = distance * 1000 + Math.min(999, Math.abs((pa[i] ?? 0) - (pb[i] ?? 0)));
  }
  return distance;
}

/**
 * The entry of the same repository whose version is closest to `version`.
 * Used as a starting point for env generation when there is no exact hit;
 * it is never validated on the instance's behalf.
 */
export function findReference(
  pool: MemoryPool,
  repo: string,
  version: string,
): MemoryPoolEntry | undefined {
  let best: MemoryPoolEntry | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const entry of pool.listByRepo(repo)) {
    const distance = versionDistance(entry.version, version);
    if (distance < bestDistance) {
      best = entry;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Commits the accepted records of an earlier run, oldest first, so the newest
 * record for a fingerprint wins. Returns how many entries were committed.
 */
export function seedFromResults(pool: MemoryPool, records: readonly ResultRecord[]): number {
  let committed = 0;
  const ordered = [...records].sort((a, b) => a.recordedAt.localeCompare(b.recordedAt));
  for (const record of ordered) {
    if (
      record.status !== 'accepted' ||
      !record.fingerprint ||
      !record.environmentSpec ||
      !record.runScript
    ) {
      continue;
    }
    pool.commit({
      fingerprint: record.fingerprint,
      repo: record.repo,
      version: record.version ?? '',
      environmentSpec: record.environmentSpec,
      runScript: record.runScript,
      sourceInstanceId: record.instanceId,
      updatedAt: record.recordedAt,
    });
    committed += 1;
  }
  return committed;
}
