import { describe, it, expect } from 'vitest';
import { createInMemoryMemoryPool, type MemoryPoolEntry } from '@envforge/memory';
import { listEntries } from './memory';

function entry(fingerprint: string, repo: string, updatedAt: string): MemoryPoolEntry {
  return {
    fingerprint,
    repo,
    version: '1.0',
    environmentSpec: 'FROM python:3.11\n',
    runScript: 'pytest\n',
    sourceInstanceId: `${repo}-1`,
    updatedAt,
  };
}

describe('listEntries', () => {
  it('lists every entry newest first, or one repository', () => {
    const pool = createInMemoryMemoryPool();
    pool.commit(entry('fp-a', 'acme/widgets', '2024-01-01T00:00:00.000Z'));
    pool.commit(entry('fp-b', 'acme/gadgets', '2024-02-01T00:00:00.000Z'));
    pool.commit(entry('fp-c', 'acme/widgets', '2024-03-01T00:00:00.000Z'));

    expect(listEntries(pool).map((e) => e.fingerprint)).toEqual(['fp-c', 'fp-b', 'fp-a']);
    expect(listEntries(pool, 'acme/widgets').map((e) => e.fingerprint)).toEqual(['fp-c', 'fp-a']);
  });
});
