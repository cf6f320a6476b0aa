import { describe, it, expect } from 'vitest';
import { parsePatch } from '@envforge/shared';
import { generateMutations } from './mutations';

const FIX = [
  'diff --git a/src/widgets/core.py b/src/widgets/core.py',
  '--- a/src/widgets/core.py',
  '+++ b/src/widgets/core.py',
  '@@ -10,3 +10,3 @@ def area(w, h):',
  '     x = 1',
  '-    return w + h',
  '+    return w * h',
  '     # end',
  '',
].join('\n');

const HEADER = ['--- a/src/widgets/core.py', '+++ b/src/widgets/core.py'];

const DROP_CONTEXT = [
  ...HEADER,
  '@@ -10,3 +10,2 @@',
  '-    x = 1',
  '     return w + h',
  '     # end',
  '',
].join('\n');

const KEEP_OLD_LINE = [
  ...HEADER,
  '@@ -10,3 +10,4 @@',
  '     x = 1',
  '     return w + h',
  '+    return w * h',
  '     # end',
  '',
].join('\n');

const SKIP_NEW_LINE = [
  ...HEADER,
  '@@ -10,3 +10,2 @@',
  '     x = 1',
  '-    return w + h',
  '     # end',
  '',
].join('\n');

function changedLines(patch: string): string[] {
  return parsePatch(patch)
    .flatMap((f) => f.hunks)
    .flatMap((h) => h.lines)
    .filter((l) => l.startsWith('+') || l.startsWith('-'));
}

describe('generateMutations', () => {
  it('returns nothing for a patch without hunks', () => {
    expect(generateMutations('', 3, 1)).toEqual([]);
  });

  it('returns nothing when only new files are touched', () => {
    const created = [
      'diff --git a/new.py b/new.py',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/new.py',
      '@@ -0,0 +1 @@',
      '+x = 1',
      '',
    ].join('\n');
    expect(generateMutations(created, 3, 1)).toEqual([]);
  });

  it('returns nothing when the only context is comments and the fix has one change', () => {
    const fix = ['--- a/a.py', '+++ b/a.py', '@@ -1,2 +1,3 @@', ' # header', '+x = 1', ' ', ''].join('\n');
    expect(generateMutations(fix, 3, 1)).toEqual([]);
  });

  it('produces the requested number of edits', () => {
    const mutations = generateMutations(FIX, 3, 1);
    expect(mutations.map((m) => m.index)).toEqual([0, 1, 2]);
    for (const m of mutations) {
      expect(m.files).toEqual(['src/widgets/core.py']);
    }
  });

  it('is deterministic for a given seed', () => {
    expect(generateMutations(FIX, 4, 9)).toEqual(generateMutations(FIX, 4, 9));
  });

  it('only produces code-changing edits that differ from the fix', () => {
    const mutations = generateMutations(FIX, 30, 3);
    const allowed = [DROP_CONTEXT, KEEP_OLD_LINE, SKIP_NEW_LINE];

    for (const mutation of mutations) {
      expect(allowed).toContain(mutation.patch);
      expect(mutation.kind).toBe(mutation.patch === DROP_CONTEXT ? 'drop-line' : 'partial-fix');

      const changed = changedLines(mutation.patch);
      expect(changed.some((l) => l.slice(1).trim() !== '' && !l.slice(1).trim().startsWith('#'))).toBe(true);
      expect(changed).not.toEqual(changedLines(FIX));
    }
    expect(new Set(mutations.map((m) => m.patch)).size).toBeGreaterThan(1);
  });

  it('deletes a neighbouring code line when the fix has a single change', () => {
    const fix = [
      '--- a/lib/calc.go',
      '+++ b/lib/calc.go',
      '@@ -5,2 +5,3 @@',
      ' a := 1',
      '+b := 2',
      ' c := 3',
      '',
    ].join('\n');

    for (const mutation of generateMutations(fix, 6, 2)) {
      expect(mutation.kind).toBe('drop-line');
      const [hunk] = parsePatch(mutation.patch)[0].hunks;
      expect(hunk.oldLines).toBe(2);
      expect(hunk.newLines).toBe(1);
      expect(changedLines(mutation.patch)).toHaveLength(1);
      expect(['-a := 1', '-c := 3']).toContain(changedLines(mutation.patch)[0]);
    }
  });
});
