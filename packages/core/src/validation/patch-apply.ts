import type { PatchKind } from '@envforge/shared';

export const PATCH_DIR = '/envforge';

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function patchPath(kind: PatchKind): string {
  return `${PATCH_DIR}/${kind}.patch`;
}

/**
 * Applies a patch file in the working tree. `git apply` is tried first, then
 * with `--recount` for hunks whose line counts are off, then `patch` with
 * fuzz for context that drifted.
 */
export function applyCommand(file: string): string {
  const p = shellQuote(file);
  return [
    `git apply -v ${p}`,
    `git apply -v --recount ${p}`,
    `patch --batch --fuzz=5 -p1 -i ${p}`,
  ].join(' || ');
}

/** Resets the working tree to the base commit, dropping untracked files */
export function pinCommand(baseCommit: string): string {
  return `git reset --hard ${shellQuote(baseCommit)} && git clean -fdx`;
}
