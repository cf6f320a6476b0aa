import {
  filePath,
  normalizePatch,
  parsePatch,
  stripCodeFence,
  touchedFiles,
  type Stage,
} from '@envforge/shared';

const EXIT_MARKER = 'EXIT_CODE=';

/**
 * Guarantees the script reports its exit status in the form the validator
 * parses. Scripts that already print the marker are left alone.
 */
export function normalizeRunScript(script: string): string {
  let body = stripCodeFence(script);
  if (body.includes(EXIT_MARKER)) {
    return body;
  }
  if (!body.endsWith('\n')) body += '\n';
  return `${body}rc=$?\necho "${EXIT_MARKER}$rc"\n`;
}

/**
 * Merges a generated test patch into the instance's existing one. Files the
 * generated patch touches replace the existing sections for those files;
 * every other existing section is kept, in its original order, ahead of the
 * generated sections.
 */
export function composeTestPatch(existing: string, generated: string): string {
  if (!existing.trim()) return normalizePatch(generated);
  const replaced = new Set(touchedFiles(generated));
  const kept = parsePatch(existing)
    .filter((file) => !replaced.has(filePath(file)))
    .map((file) => file.raw);
  return normalizePatch([...kept, normalizePatch(generated)].join(''));
}

/**
 * Cleans a raw generator artifact for its stage.
 */
export function postProcess(stage: Stage, artifact: string, existingTestPatch = ''): string {
  switch (stage) {
    case 'context':
      return artifact.trim();
    case 'test':
      return composeTestPatch(existingTestPatch, stripCodeFence(artifact));
    case 'env':
      return stripCodeFence(artifact);
    case 'run':
      return normalizeRunScript(artifact);
  }
}
