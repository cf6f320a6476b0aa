import { describe, it, expect } from 'vitest';
import {
  dependencyKey,
  fingerprint,
  isDependencyManifest,
  manifestChanges,
  normalizeVersion,
} from './fingerprint';

const SOURCE_FIX = [
  '--- a/src/widgets/core.py',
  '+++ b/src/widgets/core.py',
  '@@ -1 +1 @@',
  '-return a + b',
  '+return a * b',
].join('\n');

const DEPENDENCY_FIX = [
  SOURCE_FIX,
  '--- a/requirements.txt',
  '+++ b/requirements.txt',
  '@@ -1 +1 @@',
  '-numpy<2',
  '+numpy>=2',
].join('\n');

describe('normalizeVersion', () => {
  it.each([
    ['v2.3.1', '2.3'],
    ['2.3', '2.3'],
    ['2.3.0rc1', '2.3'],
    ['4', '4.0'],
    ['', 'unversioned'],
    ['main', 'main'],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeVersion(input)).toBe(expected);
  });
});

describe('isDependencyManifest', () => {
  it('recognises manifests at any depth', () => {
    expect(isDependencyManifest('requirements-dev.txt')).toBe(true);
    expect(isDependencyManifest('packages/web/package.json')).toBe(true);
    expect(isDependencyManifest('go.mod')).toBe(true);
    expect(isDependencyManifest('src/setup.pyc')).toBe(false);
    expect(isDependencyManifest('docs/package.json.md')).toBe(false);
  });
});

describe('manifestChanges', () => {
  it('collects changed manifest lines only', () => {
    expect(manifestChanges(DEPENDENCY_FIX)).toBe('#requirements.txt\n-numpy<2\n+numpy>=2');
    expect(manifestChanges(SOURCE_FIX)).toBe('');
  });
});

describe('dependencyKey', () => {
  it('prefers a collector-supplied manifest hash', () => {
    expect(dependencyKey({ version: '2.3', patch: DEPENDENCY_FIX, manifestHash: 'abc' })).toBe(
      'manifest:abc',
    );
  });

  it('falls back to the normalized version', () => {
    expect(dependencyKey({ version: '2.3.4', patch: SOURCE_FIX })).toBe('version:2.3');
  });

  it('adds a digest of manifest changes made by the fix', () => {
    expect(dependencyKey({ version: '2.3', patch: DEPENDENCY_FIX })).toMatch(
      /^version:2\.3\+deps:[0-9a-f]{16}$/,
    );
  });
});

describe('fingerprint', () => {
  const base = { repo: 'acme/widgets', version: '2.3.1', patch: SOURCE_FIX };

  it('is stable across instances of the same repo and minor version', () => {
    expect(fingerprint(base)).toBe(fingerprint({ ...base, version: '2.3.7', patch: '' }));
    expect(fingerprint(base)).toBe(fingerprint({ ...base, repo: 'Acme/Widgets' }));
  });

  it('separates repositories, versions and dependency changes', () => {
    const f = fingerprint(base);
    expect(fingerprint({ ...base, repo: 'acme/gadgets' })).not.toBe(f);
    expect(fingerprint({ ...base, version: '2.4.0' })).not.toBe(f);
    expect(fingerprint({ ...base, patch: DEPENDENCY_FIX })).not.toBe(f);
  });

  it('is a sha256 hex digest', () => {
    expect(fingerprint(base)).toMatch(/^[0-9a-f]{64}$/);
  });
});
