import { promises as fs } from 'fs';
import {
  TaskInstanceSchema,
  UsageError,
  type TaskInstance,
} from '@envforge/shared';

/** Collector field names accepted alongside the camelCase ones */
const FIELD_ALIASES: Readonly<Record<string, string>> = {
  instance_id: 'instanceId',
  base_commit: 'baseCommit',
  test_patch: 'testPatch',
  problem_statement: 'problemStatement',
  hints_text: 'hintsText',
  created_at: 'createdAt',
  pull_number: 'pullNumber',
  manifest_hash: 'manifestHash',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const target = FIELD_ALIASES[key] ?? key;
    if (!(target in out)) out[target] = value;
  }
  // Collectors emit the version as a number as often as a string.
  if (typeof out.version === 'number') out.version = String(out.version);
  return out;
}

export function parseTask(raw: unknown, where: string): TaskInstance {
  if (!isRecord(raw)) {
    throw new UsageError(`Task record at ${where} is not an object`);
  }
  const parsed = TaskInstanceSchema.safeParse(normalizeKeys(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new UsageError(`Invalid task record at ${where}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Parses task records from JSONL or from a JSON array.
 */
export function parseTasks(text: string, source: string): TaskInstance[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith('[')) {
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (error) {
      throw new UsageError(`Failed to parse ${source} as JSON`, { cause: error });
    }
    if (!Array.isArray(raw)) {
      throw new UsageError(`${source} is not a JSON array`);
    }
    return raw.map((item, index) => parseTask(item, `${source}[${index}]`));
  }

  const tasks: TaskInstance[] = [];
  text.split('\n').forEach((line, index) => {
    if (!line.trim()) return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new UsageError(`Failed to parse ${source}:${index + 1} as JSON`, { cause: error });
    }
    tasks.push(parseTask(raw, `${source}:${index + 1}`));
  });
  return tasks;
}

export interface TaskFilter {
  /** Keep only this instance */
  taskId?: string;
  /** Keep only instances listed here */
  taskIds?: readonly string[];
}

export function filterTasks(tasks: TaskInstance[], filter: TaskFilter): TaskInstance[] {
  let selected = tasks;
  if (filter.taskId) {
    selected = selected.filter((t) => t.instanceId === filter.taskId);
  }
  if (filter.taskIds) {
    const wanted = new Set(filter.taskIds);
    selected = selected.filter((t) => wanted.has(t.instanceId));
  }
  return selected;
}

async function readInput(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new UsageError(`Cannot read ${filePath}`, { cause: error });
  }
}

/** One instance id per line; blank lines and `#` comments ignored */
export async function readTaskList(filePath: string): Promise<string[]> {
  const text = await readInput(filePath);
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

export async function loadTasks(filePath: string, filter: TaskFilter = {}): Promise<TaskInstance[]> {
  const tasks = parseTasks(await readInput(filePath), filePath);
  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.instanceId)) {
      throw new UsageError(`Duplicate instance id ${task.instanceId} in ${filePath}`);
    }
    seen.add(task.instanceId);
  }
  return filterTasks(tasks, filter);
}
