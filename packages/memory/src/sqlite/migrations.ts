import type Database from 'better-sqlite3';

const MIGRATIONS: string[] = [
  `
  CREATE TABLE IF NOT EXISTS memory_pool (
    fingerprint TEXT PRIMARY KEY,
    repo TEXT NOT NULL,
    version TEXT NOT NULL,
    environmentSpec TEXT NOT NULL,
    runScript TEXT NOT NULL,
    sourceInstanceId TEXT NOT NULL,
    updatedAt TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS memory_pool_repo ON memory_pool (repo, updatedAt);
  `,
];

/**
 * Applies pending migrations, tracked by `PRAGMA user_version`.
 */
export function runMigrations(db: Database.Database): void {
  const current = db.pragma('user_version', { simple: true });
  const applied = typeof current === 'number' ? current : 0;

  for (let version = applied; version < MIGRATIONS.length; version++) {
    db.transaction(() => {
      db.exec(MIGRATIONS[version]);
      db.pragma(`user_version = ${version + 1}`);
    })();
  }
}
