import { createHash } from 'crypto';
import { parsePatch, filePath, type TaskInstance } from '@envforge/shared';

/**
 * File names whose changes alter the dependency set. A fix touching one of
 * these must not reuse an environment cached before the change.
 */
const DEPENDENCY_MANIFESTS = [
  /(^|\/)package\.json$/,
  /(^|\/)requirements[^/]*\.txt$/,
  /(^|\/)pyproject\.toml$/,
  /(^|\/)setup\.py$/,
  /(^|\/)setup\.cfg$/,
  /(^|\/)Pipfile$/,
  /(^|\/)environment\.ya?ml$/,
  /(^|\/)go\.mod$/,
  /(^|\/)Cargo\.toml$/,
  /(^|\/)pom\.xml$/,
  /(^|\/)build\.gradle(\.kts)?$/,
  /(^|\/)Gemfile$/,
  /(^|\/)composer\.json$/,
];

const sha256 = (text: string): string => createHash('sha256').update(text).digest('hex');

export function isDependencyManifest(path: string): boolean {
  return DEPENDENCY_MANIFESTS.some((pattern) => pattern.test(path));
}

/**
 * `major.minor` of a version string; `v2.3.1`, `2.3` and `2.3.0rc1` all give `2.3`.
 */
export function normalizeVersion(version: string): string {
  const match = /(\d+)(?:\.(\d+))?/.exec(version);
  if (!match) {
    return version.trim() || 'unversioned';
  }
  return `${match[1]}.${match[2] ?? '0'}`;
}

/**
 * Changed lines of the fix that fall in dependency manifests, in patch order.
 */
export function manifestChanges(patch: string): string {
  const changes: string[] = [];
  for (const file of parsePatch(patch)) {
    const path = filePath(file);
    if (!isDependencyManifest(path)) continue;
    changes.push(`#${path}`);
    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.startsWith('+') || line.startsWith('-')) changes.push(line);
      }
    }
  }
  return changes.join('\n');
}

export function dependencyKey(
  instance: Pick<TaskInstance, 'version' | 'patch' | 'manifestHash'>,
): string {
  if (instance.manifestHash) {
    return `manifest:${instance.manifestHash}`;
  }
  const base = `version:${normalizeVersion(instance.version)}`;
  const changes = manifestChanges(instance.patch);
  return changes ? `${base}+deps:${sha256(changes).slice(0, 16)}` : base;
}

/**
 * Memory Pool key for an instance: repository identity plus dependency key.
 */
export function fingerprint(
  instance: Pick<TaskInstance, 'repo' | 'version' | 'patch' | 'manifestHash'>,
): string {
  return sha256(`${instance.repo.toLowerCase()}\n${dependencyKey(instance)}`);
}
