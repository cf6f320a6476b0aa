export interface Hunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Body lines including their ' ', '+', '-' or '\' prefix */
  lines: string[];
}

export interface FilePatch {
  /** null for created files */
  oldPath: string | null;
  /** null for deleted files */
  newPath: string | null;
  hunks: Hunk[];
  /** This file's section of the patch text, headers included */
  raw: string;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DIFF_GIT = /^diff --git a\/(.+?) b\/(.+)$/;

function stripPrefix(raw: string): string | null {
  const path = raw.replace(/\t.*$/, '').trim();
  if (path === '/dev/null') return null;
  return path.replace(/^[ab]\//, '');
}

export function filePath(file: FilePatch): string {
  return file.newPath ?? file.oldPath ?? '';
}

/**
 * Parses a unified diff (git or plain `---`/`+++` style) into per-file hunks.
 * Hunk bodies are delimited by their declared line counts, so removed lines
 * that happen to start with `--` are not mistaken for file headers.
 */
export function parsePatch(patch: string): FilePatch[] {
  const files: FilePatch[] = [];
  const starts: number[] = [];
  const lines = patch.replace(/\r\n/g, '\n').split('\n');
  let current: FilePatch | undefined;
  let hunk: Hunk | undefined;
  let oldLeft = 0;
  let newLeft = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (hunk && (oldLeft > 0 || newLeft > 0)) {
      const tag = line[0];
      if (tag === ' ' || line === '') {
        oldLeft -= 1;
        newLeft -= 1;
        hunk.lines.push(line === '' ? ' ' : line);
        continue;
      }
      if (tag === '-') {
        oldLeft -= 1;
        hunk.lines.push(line);
        continue;
      }
      if (tag === '+') {
        newLeft -= 1;
        hunk.lines.push(line);
        continue;
      }
      if (tag === '\\') {
        hunk.lines.push(line);
        continue;
      }
      // Malformed count: fall through and treat the line as a header.
      hunk = undefined;
    } else if (hunk && line.startsWith('\\')) {
      hunk.lines.push(line);
      continue;
    }

    const gitHeader = DIFF_GIT.exec(line);
    if (gitHeader) {
      current = { oldPath: gitHeader[1], newPath: gitHeader[2], hunks: [], raw: '' };
      files.push(current);
      starts.push(i);
      hunk = undefined;
      continue;
    }

    if (line.startsWith('--- ') && lines[i + 1]?.startsWith('+++ ')) {
      if (!current || current.hunks.length > 0) {
        current = { oldPath: null, newPath: null, hunks: [], raw: '' };
        files.push(current);
        starts.push(i);
      }
      current.oldPath = stripPrefix(line.slice(4));
      current.newPath = stripPrefix(lines[i + 1].slice(4));
      hunk = undefined;
      i += 1;
      continue;
    }

    const header = HUNK_HEADER.exec(line);
    if (header && current) {
      hunk = {
        oldStart: Number(header[1]),
        oldLines: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newLines: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
      };
      oldLeft = hunk.oldLines;
      newLeft = hunk.newLines;
      current.hunks.push(hunk);
      continue;
    }

    if (line.startsWith('new file mode') && current) {
      current.oldPath = null;
    } else if (line.startsWith('deleted file mode') && current) {
      current.newPath = null;
    }
  }

  files.forEach((file, index) => {
    const end = index + 1 < starts.length ? starts[index + 1] : lines.length;
    file.raw = normalizePatch(lines.slice(starts[index], end).join('\n'));
  });

  return files;
}

/**
 * Paths a patch touches, in order of first appearance.
 */
export function touchedFiles(patch: string): string[] {
  const seen = new Set<string>();
  for (const file of parsePatch(patch)) {
    const path = filePath(file);
    if (path) seen.add(path);
  }
  return [...seen];
}

/**
 * Removes blank lines around a patch and guarantees a trailing newline;
 * `git apply` rejects patches whose last hunk line is unterminated.
 */
export function normalizePatch(patch: string): string {
  // Only newlines are trimmed at the end: a final ' ' line is blank context.
  const trimmed = patch.replace(/^(?:[ \t]*\n)+/, '').replace(/\n+$/, '');
  return trimmed.trim() ? `${trimmed}\n` : '';
}
