import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { atomicWrite, readTextIfExists, writeJson } from './io';

describe('fs io', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'envforge-io-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('atomicWrite creates parent directories and leaves no temp files', async () => {
    const target = join(dir, 'a', 'b', 'Dockerfile');
    await atomicWrite(target, 'FROM alpine\n');
    expect(readFileSync(target, 'utf8')).toBe('FROM alpine\n');
    expect(readdirSync(join(dir, 'a', 'b'))).toEqual(['Dockerfile']);
  });

  it('writeJson pretty-prints with a trailing newline', async () => {
    const target = join(dir, 'status.json');
    await writeJson(target, { status: 'accepted' });
    expect(readFileSync(target, 'utf8')).toBe('{\n  "status": "accepted"\n}\n');
  });

  it('readTextIfExists returns undefined for a missing file', async () => {
    expect(await readTextIfExists(join(dir, 'missing.txt'))).toBeUndefined();
    await atomicWrite(join(dir, 'x.txt'), 'x');
    expect(await readTextIfExists(join(dir, 'x.txt'))).toBe('x');
  });
});
