export const name = '@envforge/memory';

export type { MemoryPool, MemoryPoolEntry } from './types';
export {
  fingerprint,
  dependencyKey,
  normalizeVersion,
  manifestChanges,
  isDependencyManifest,
} from './fingerprint';
export { createInMemoryMemoryPool } from './pool';
export { createSqliteMemoryPool } from './sqlite/pool';
export type { SqliteMemoryPoolOptions } from './sqlite/pool';
export { findReference, seedFromResults } from './reference';
export { createMemoryPool } from './factory';
