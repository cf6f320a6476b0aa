import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { MemoryError } from '@envforge/shared';
import type { MemoryPool, MemoryPoolEntry } from '../types';
import { runMigrations } from './migrations';

export interface SqliteMemoryPoolOptions {
  dbPath: string;
}

interface MemoryPoolRow {
  fingerprint: string;
  repo: string;
  version: string;
  environmentSpec: string;
  runScript: string;
  sourceInstanceId: string;
  updatedAt: string;
}

const rowToEntry = (row: MemoryPoolRow): MemoryPoolEntry => Object.freeze({ ...row });

/**
 * Memory Pool persisted in SQLite so validated environments survive across runs.
 * Each commit is a single upsert, which SQLite applies atomically.
 */
export function createSqliteMemoryPool(options: SqliteMemoryPoolOptions): MemoryPool {
  let db: Database.Database;
  try {
    mkdirSync(dirname(options.dbPath), { recursive: true });
    db = new Database(options.dbPath);
    db.pragma('journal_mode = WAL');
    runMigrations(db);
  } catch (err) {
    throw new MemoryError(`Failed to open memory pool at ${options.dbPath}`, { cause: err });
  }

  const getStmt = db.prepare<[string], MemoryPoolRow>(
    'SELECT * FROM memory_pool WHERE fingerprint = ?',
  );
  const upsertStmt = db.prepare<[MemoryPoolRow]>(`
    INSERT INTO memory_pool (
      fingerprint, repo, version, environmentSpec, runScript, sourceInstanceId, updatedAt
    )
    VALUES (
      @fingerprint, @repo, @version, @environmentSpec, @runScript, @sourceInstanceId, @updatedAt
    )
    ON CONFLICT(fingerprint) DO UPDATE SET
      repo = excluded.repo,
      version = excluded.version,
      environmentSpec = excluded.environmentSpec,
      runScript = excluded.runScript,
      sourceInstanceId = excluded.sourceInstanceId,
      updatedAt = excluded.updatedAt;
  `);
  const byRepoStmt = db.prepare<[string], MemoryPoolRow>(
    'SELECT * FROM memory_pool WHERE repo = ? ORDER BY updatedAt DESC',
  );
  const allStmt = db.prepare<[], MemoryPoolRow>('SELECT * FROM memory_pool ORDER BY updatedAt DESC');
  const clearStmt = db.prepare('DELETE FROM memory_pool');

  return {
    lookup: (fingerprint) => {
      const row = getStmt.get(fingerprint);
      return row ? rowToEntry(row) : undefined;
    },
    commit: (entry) => {
      upsertStmt.run({
        fingerprint: entry.fingerprint,
        repo: entry.repo,
        version: entry.version,
        environmentSpec: entry.environmentSpec,
        runScript: entry.runScript,
        sourceInstanceId: entry.sourceInstanceId,
        updatedAt: entry.updatedAt,
      });
    },
    listByRepo: (repo) => byRepoStmt.all(repo).map(rowToEntry),
    list: () => allStmt.all().map(rowToEntry),
    clear: () => clearStmt.run().changes,
    close: () => {
      if (db.open) db.close();
    },
  };
}
