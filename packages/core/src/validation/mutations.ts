import { parsePatch, type Hunk } from '@envforge/shared';

export type MutationKind = 'drop-line' | 'partial-fix';

export interface Mutation {
  index: number;
  kind: MutationKind;
  /** Files the edit touches */
  files: string[];
  /** Unified diff of the edit against the pre-fix tree */
  patch: string;
}

/** mulberry32 */
function prng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const COMMENT_ONLY = /^\s*(#|\/\/|--|\/\*|\*|$)/;

interface Edit {
  kind: MutationKind;
  file: string;
  hunk: Hunk;
  /** Index into `hunk.lines` of the line the edit is about */
  line: number;
}

function editsOf(file: string, hunk: Hunk): Edit[] {
  const edits: Edit[] = [];
  const changes: number[] = [];
  hunk.lines.forEach((line, i) => {
    if (line.startsWith(' ') && !COMMENT_ONLY.test(line.slice(1))) {
      edits.push({ kind: 'drop-line', file, hunk, line: i });
    } else if (line.startsWith('+') || line.startsWith('-')) {
      changes.push(i);
    }
  });
  // Leaving out one change only differs from both trees when there are two or more.
  // Hunks with a no-newline marker are not split; the marker pairs lines on both sides.
  if (changes.length >= 2 && !hunk.lines.some((l) => l.startsWith('\\'))) {
    for (const i of changes) edits.push({ kind: 'partial-fix', file, hunk, line: i });
  }
  return edits;
}

/**
 * Derives `count` independent edits that change code inside the hunks of a
 * fix patch without reproducing the fix. An edit either deletes one
 * unchanged code line next to the fix (`drop-line`), or applies one fix hunk
 * with a single changed line left out (`partial-fix`). The same fix, count
 * and seed always give the same edits.
 */
export function generateMutations(fixPatch: string, count: number, seed: number): Mutation[] {
  const edits: Edit[] = [];
  for (const file of parsePatch(fixPatch)) {
    if (!file.oldPath) continue;
    for (const hunk of file.hunks) edits.push(...editsOf(file.oldPath, hunk));
  }
  if (edits.length === 0) return [];

  const mutations: Mutation[] = [];
  for (let index = 0; index < count; index++) {
    const random = prng(Math.imul(seed + 1, 0x9e3779b1) ^ index);
    const edit = edits[Math.floor(random() * edits.length)];
    mutations.push({ index, kind: edit.kind, files: [edit.file], patch: render(edit) });
  }
  return mutations;
}

function dropLine(hunk: Hunk, target: number): string[] {
  const body: string[] = [];
  let lastWasPre = false;
  hunk.lines.forEach((line, i) => {
    if (line.startsWith(' ') || line.startsWith('-')) {
      body.push(`${i === target ? '-' : ' '}${line.slice(1)}`);
      lastWasPre = true;
    } else if (line.startsWith('\\')) {
      if (lastWasPre) body.push(line);
    } else {
      lastWasPre = false;
    }
  });
  return body;
}

function partialFix(hunk: Hunk, target: number): string[] {
  const body: string[] = [];
  hunk.lines.forEach((line, i) => {
    if (i !== target) body.push(line);
    else if (line.startsWith('-')) body.push(` ${line.slice(1)}`);
  });
  return body;
}

function render({ kind, file, hunk, line }: Edit): string {
  const body = kind === 'drop-line' ? dropLine(hunk, line) : partialFix(hunk, line);
  const oldCount = body.filter((l) => l.startsWith(' ') || l.startsWith('-')).length;
  const newCount = body.filter((l) => l.startsWith(' ') || l.startsWith('+')).length;
  const newStart = newCount === 0 ? hunk.oldStart - 1 : hunk.oldStart;

  return [
    `--- a/${file}`,
    `+++ b/${file}`,
    `@@ -${hunk.oldStart},${oldCount} +${newStart},${newCount} @@`,
    ...body,
    '',
  ].join('\n');
}
