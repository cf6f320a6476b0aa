import type { MemoryPoolConfig } from '@envforge/shared';
import { createInMemoryMemoryPool } from './pool';
import { createSqliteMemoryPool } from './sqlite/pool';
import type { MemoryPool } from './types';

export function createMemoryPool(config: Pick<MemoryPoolConfig, 'backend' | 'path'>): MemoryPool {
  switch (config.backend) {
    case 'sqlite':
      return createSqliteMemoryPool({ dbPath: config.path });
    case 'memory':
      return createInMemoryMemoryPool();
  }
}
