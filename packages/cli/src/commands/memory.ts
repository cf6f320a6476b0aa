import type { Command } from 'commander';
import { createSqliteMemoryPool, type MemoryPool, type MemoryPoolEntry } from '@envforge/memory';
import { OutputRenderer } from '../output/renderer';
import { globalOptions, loadConfig } from '../context';

export function listEntries(pool: MemoryPool, repo?: string): MemoryPoolEntry[] {
  return repo ? pool.listByRepo(repo) : pool.list();
}

function openPool(program: Command, memoryPath?: string): MemoryPool {
  const dbPath = memoryPath ?? loadConfig(program).memoryPool.path;
  return createSqliteMemoryPool({ dbPath });
}

export function registerMemoryCommand(program: Command) {
  const memory = program.command('memory').description('Inspect or clear the persistent Memory Pool');

  memory
    .command('list')
    .description('List validated environments')
    .option('--memory-path <path>', 'SQLite file of the Memory Pool')
    .option('--repo <owner/name>', 'Only entries for this repository')
    .action((options: { memoryPath?: string; repo?: string }) => {
      const renderer = new OutputRenderer(!!globalOptions(program).json);
      const pool = openPool(program, options.memoryPath);
      try {
        renderer.renderMemoryEntries(listEntries(pool, options.repo));
      } finally {
        pool.close();
      }
    });

  memory
    .command('clear')
    .description('Remove every entry')
    .option('--memory-path <path>', 'SQLite file of the Memory Pool')
    .action((options: { memoryPath?: string }) => {
      const renderer = new OutputRenderer(!!globalOptions(program).json);
      const pool = openPool(program, options.memoryPath);
      try {
        renderer.renderMemoryCleared(pool.clear());
      } finally {
        pool.close();
      }
    });
}
