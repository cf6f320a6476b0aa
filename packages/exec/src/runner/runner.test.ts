import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock, MockInstance } from 'vitest';
import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { ProcessError } from '@envforge/shared';
import { SubprocessRunner, getSafeEnv } from './runner';

vi.mock('child_process', () => {
  const spawn = vi.fn();
  return {
    spawn,
    default: {
      spawn,
    },
  };
});

class FakeChild extends EventEmitter {
  pid = 4321;
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = Object.assign(new EventEmitter(), { end: vi.fn() });
}

describe('getSafeEnv', () => {
  it('keeps PATH, baseline keys and allowlisted keys only', () => {
    const env = getSafeEnv(
      { PATH: '/usr/bin', HOME: '/home/u', GITHUB_TOKEN: 'test-secret', OTHER: 'x' },
      ['OTHER'],
      { EXTRA: '1' },
    );
    expect(env).toEqual({ PATH: '/usr/bin', HOME: '/home/u', OTHER: 'x', EXTRA: '1' });
  });
});

describe('SubprocessRunner', () => {
  let child: FakeChild;
  let killSpy: MockInstance<typeof process.kill>;

  beforeEach(() => {
    vi.clearAllMocks();
    child = new FakeChild();
    (spawn as unknown as Mock).mockReturnValue(child);
    killSpy = vi.spyOn(process, 'kill').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('collects output and resolves with the exit code', async () => {
    const runner = new SubprocessRunner({ PATH: '/bin', GITHUB_TOKEN: 'test-secret' });
    const pending = runner.run({ bin: 'docker', args: ['version'], timeoutMs: 1000 });

    child.stdout.emit('data', Buffer.from('hello '));
    child.stdout.emit('data', Buffer.from('world'));
    child.stderr.emit('data', Buffer.from('warn'));
    child.emit('close', 0);

    const result = await pending;
    expect(result).toMatchObject({
      exitCode: 0,
      stdout: 'hello world',
      stderr: 'warn',
      timedOut: false,
      truncated: false,
    });
    expect(spawn).toHaveBeenCalledWith('docker', ['version'], {
      cwd: undefined,
      env: { PATH: '/bin' },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
  });

  it('writes input to stdin', async () => {
    const runner = new SubprocessRunner({});
    const pending = runner.run({ bin: 'cat', args: [], input: 'payload', timeoutMs: 1000 });
    child.emit('close', 0);
    await pending;

    expect(child.stdin.end).toHaveBeenCalledWith('payload');
    expect((spawn as unknown as Mock).mock.calls[0][2].stdio).toEqual(['pipe', 'pipe', 'pipe']);
  });

  it('kills the process group on timeout and reports timedOut', async () => {
    vi.useFakeTimers();
    const runner = new SubprocessRunner({});
    const pending = runner.run({ bin: 'sleep', args: ['100'], timeoutMs: 50 });

    vi.advanceTimersByTime(50);
    expect(killSpy).toHaveBeenCalledWith(-4321, 'SIGTERM');

    child.emit('close', null);
    const result = await pending;
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
  });

  it('truncates output past the cap and stops the process', async () => {
    const runner = new SubprocessRunner({});
    const pending = runner.run({ bin: 'yes', args: [], timeoutMs: 1000, maxOutputBytes: 5 });

    child.stdout.emit('data', Buffer.from('abcdefgh'));
    child.stdout.emit('data', Buffer.from('ignored'));
    child.emit('close', 143);

    const result = await pending;
    expect(result.truncated).toBe(true);
    expect(result.stdout).toBe('abcde\n[Output truncated due to limit]\n');
    expect(killSpy).toHaveBeenCalledWith(-4321, 'SIGTERM');
  });

  it('rejects with ProcessError when the binary cannot be started', async () => {
    const runner = new SubprocessRunner({});
    const pending = runner.run({ bin: 'missing', args: [], timeoutMs: 1000 });

    child.emit('error', new Error('spawn missing ENOENT'));

    await expect(pending).rejects.toBeInstanceOf(ProcessError);
    await expect(pending).rejects.toThrow('Failed to start missing: spawn missing ENOENT');
  });
});
