import { describe, it, expect } from 'vitest';
import { normalizePatch, parsePatch, touchedFiles } from './diff';

const FIX = [
  'diff --git a/src/widgets/core.py b/src/widgets/core.py',
  'index 1111111..2222222 100644',
  '--- a/src/widgets/core.py',
  '+++ b/src/widgets/core.py',
  '@@ -10,3 +10,3 @@ def area(w, h):',
  '     x = 1',
  '-    return w + h',
  '+    return w * h',
  '     # end',
  '@@ -40,2 +40,3 @@',
  ' a',
  '+b',
  ' c',
].join('\n');

describe('parsePatch', () => {
  it('parses git-style headers and hunk ranges', () => {
    const files = parsePatch(FIX);
    expect(files).toHaveLength(1);
    expect(files[0].oldPath).toBe('src/widgets/core.py');
    expect(files[0].hunks.map((h) => [h.oldStart, h.oldLines, h.newStart, h.newLines])).toEqual([
      [10, 3, 10, 3],
      [40, 2, 40, 3],
    ]);
    expect(files[0].hunks[0].lines).toEqual([
      '     x = 1',
      '-    return w + h',
      '+    return w * h',
      '     # end',
    ]);
  });

  it('does not mistake a removed "-- " line for a file header', () => {
    const patch = [
      '--- a/notes.sql',
      '+++ b/notes.sql',
      '@@ -1,2 +1,1 @@',
      '--- a comment',
      ' SELECT 1;',
    ].join('\n');
    const files = parsePatch(patch);
    expect(files).toHaveLength(1);
    expect(files[0].hunks[0].lines).toEqual(['--- a comment', ' SELECT 1;']);
  });

  it('marks created and deleted files', () => {
    const patch = [
      'diff --git a/tests/test_new.py b/tests/test_new.py',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/tests/test_new.py',
      '@@ -0,0 +1 @@',
      '+def test_x(): pass',
      'diff --git a/old.txt b/old.txt',
      'deleted file mode 100644',
      '--- a/old.txt',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-gone',
    ].join('\n');
    const [created, deleted] = parsePatch(patch);
    expect(created.oldPath).toBeNull();
    expect(created.newPath).toBe('tests/test_new.py');
    expect(deleted.oldPath).toBe('old.txt');
    expect(deleted.newPath).toBeNull();
  });
});

describe('touchedFiles', () => {
  it('lists each path once', () => {
    const patch = [
      '--- a/tests/test_a.py',
      '+++ b/tests/test_a.py',
      '@@ -1 +1 @@',
      '-x',
      '+y',
      '--- /dev/null',
      '+++ b/tests/test_b.py',
      '@@ -0,0 +1 @@',
      '+z',
    ].join('\n');
    expect(touchedFiles(patch)).toEqual(['tests/test_a.py', 'tests/test_b.py']);
  });

  it('returns nothing for an empty patch', () => {
    expect(touchedFiles('')).toEqual([]);
  });
});

describe('normalizePatch', () => {
  it('trims outer blank lines and adds a final newline', () => {
    expect(normalizePatch('\n\n--- a/x\n+++ b/x\n@@ -1 +1 @@\n-a\n+b\n\n\n')).toBe(
      '--- a/x\n+++ b/x\n@@ -1 +1 @@\n-a\n+b\n',
    );
  });

  it('keeps an empty patch empty', () => {
    expect(normalizePatch('  \n')).toBe('');
  });
});

describe('parsePatch raw sections', () => {
  it('keeps each file section verbatim', () => {
    const patch = [
      'diff --git a/a.py b/a.py',
      '--- a/a.py',
      '+++ b/a.py',
      '@@ -1 +1 @@',
      '-x',
      '+y',
      'diff --git a/b.py b/b.py',
      '--- a/b.py',
      '+++ b/b.py',
      '@@ -1 +1 @@',
      '-p',
      '+q',
      '',
    ].join('\n');
    const [a, b] = parsePatch(patch);
    expect(a.raw).toBe('diff --git a/a.py b/a.py\n--- a/a.py\n+++ b/a.py\n@@ -1 +1 @@\n-x\n+y\n');
    expect(b.raw).toBe('diff --git a/b.py b/b.py\n--- a/b.py\n+++ b/b.py\n@@ -1 +1 @@\n-p\n+q\n');
  });
});
