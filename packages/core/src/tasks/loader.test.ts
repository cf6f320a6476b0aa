import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { UsageError } from '@envforge/shared';
import { filterTasks, loadTasks, parseTasks, readTaskList } from './loader';

const snake = {
  instance_id: 'acme__widgets-1',
  repo: 'acme/widgets',
  base_commit: 'a'.repeat(40),
  patch: 'diff --git a/x b/x\n',
  test_patch: '',
  problem_statement: 'broken',
  hints_text: '',
  created_at: '2024-01-01T00:00:00Z',
  version: 1.2,
};

const camel = {
  instanceId: 'acme__widgets-2',
  repo: 'acme/widgets',
  baseCommit: 'b'.repeat(40),
  patch: 'diff --git a/y b/y\n',
};

describe('parseTasks', () => {
  it('reads JSONL with snake_case fields', () => {
    const [task] = parseTasks(JSON.stringify(snake) + '\n', 'tasks.jsonl');
    expect(task.instanceId).toBe('acme__widgets-1');
    expect(task.baseCommit).toBe('a'.repeat(40));
    expect(task.problemStatement).toBe('broken');
    expect(task.version).toBe('1.2');
  });

  it('reads a JSON array and fills defaults', () => {
    const tasks = parseTasks(JSON.stringify([camel]), 'tasks.json');
    expect(tasks).toHaveLength(1);
    expect(tasks[0]).toMatchObject({ testPatch: '', hintsText: '', version: '' });
  });

  it('ignores blank lines', () => {
    const text = `\n${JSON.stringify(camel)}\n\n${JSON.stringify(snake)}\n`;
    expect(parseTasks(text, 't').map((t) => t.instanceId)).toEqual([
      'acme__widgets-2',
      'acme__widgets-1',
    ]);
  });

  it('names the line of an invalid record', () => {
    const text = `${JSON.stringify(camel)}\n${JSON.stringify({ repo: 'acme/widgets' })}\n`;
    expect(() => parseTasks(text, 'tasks.jsonl')).toThrow(UsageError);
    expect(() => parseTasks(text, 'tasks.jsonl')).toThrow(/tasks\.jsonl:2/);
  });

  it('rejects a line that is not JSON', () => {
    expect(() => parseTasks('{nope\n', 'tasks.jsonl')).toThrow('Failed to parse tasks.jsonl:1 as JSON');
  });
});

describe('filterTasks', () => {
  const tasks = parseTasks(JSON.stringify([camel, { ...camel, instanceId: 'acme__widgets-3' }]), 't');

  it('keeps a single task', () => {
    expect(filterTasks(tasks, { taskId: 'acme__widgets-3' }).map((t) => t.instanceId)).toEqual([
      'acme__widgets-3',
    ]);
  });

  it('keeps listed tasks in input order', () => {
    const kept = filterTasks(tasks, { taskIds: ['acme__widgets-3', 'acme__widgets-2'] });
    expect(kept.map((t) => t.instanceId)).toEqual(['acme__widgets-2', 'acme__widgets-3']);
  });
});

describe('file loading', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tasks-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads and filters a task file', async () => {
    const file = path.join(tmpDir, 'tasks.jsonl');
    await fs.writeFile(file, [camel, snake].map((t) => JSON.stringify(t)).join('\n'));
    const tasks = await loadTasks(file, { taskId: 'acme__widgets-1' });
    expect(tasks.map((t) => t.instanceId)).toEqual(['acme__widgets-1']);
  });

  it('rejects duplicate instance ids', async () => {
    const file = path.join(tmpDir, 'tasks.jsonl');
    await fs.writeFile(file, [camel, camel].map((t) => JSON.stringify(t)).join('\n'));
    await expect(loadTasks(file)).rejects.toThrow('Duplicate instance id acme__widgets-2');
  });

  it('reports a missing file as a usage error', async () => {
    await expect(loadTasks(path.join(tmpDir, 'missing.jsonl'))).rejects.toBeInstanceOf(UsageError);
  });

  it('reads a task list', async () => {
    const file = path.join(tmpDir, 'ids.txt');
    await fs.writeFile(file, 'acme__widgets-1\n# skip me\n\n  acme__widgets-2  \n');
    expect(await readTaskList(file)).toEqual(['acme__widgets-1', 'acme__widgets-2']);
  });
});
