/**
 * Command execution — Unit Tests
 * Mocks node:child_process so nothing is spawned.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

import { spawn } from 'node:child_process';
import { ProcessRunner, DryRunRunner, formatCommand } from '../../../src/utils/exec.js';

const mockSpawn = vi.mocked(spawn);

function fakeChild(): EventEmitter {
  const child = new EventEmitter();
  // spawn() returns a ChildProcess; the runner only listens for events
  mockSpawn.mockReturnValue(child as unknown as ReturnType<typeof spawn>);
  return child;
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('formatCommand', () => {
  it('joins the command and its arguments', () => {
    expect(formatCommand({ command: 'conda', args: ['info', '-a'] })).toBe('conda info -a');
  });

  it('quotes arguments containing whitespace', () => {
    expect(formatCommand({ command: 'git', args: ['commit', '-m', 'two words'] })).toBe('git commit -m "two words"');
  });
});

describe('ProcessRunner', () => {
  it('spawns without a shell and resolves with the exit code', async () => {
    const child = fakeChild();
    const runner = new ProcessRunner('/tmp/project');

    const pending = runner.run({ command: 'conda', args: ['info'], cwd: 'docs' });
    child.emit('close', 3, null);
    const result = await pending;

    expect(result.exitCode).toBe(3);
    expect(mockSpawn).toHaveBeenCalledWith('conda', ['info'], expect.objectContaining({
      cwd: '/tmp/project/docs',
      stdio: 'inherit',
    }));
  });

  it('passes the env overlay to the child only', async () => {
    const child = fakeChild();
    const pending = new ProcessRunner('/tmp/project').run({
      command: 'anaconda',
      args: ['upload'],
      env: { ANACONDA_API_TOKEN: 'test-secret' },
    });
    child.emit('close', 0, null);
    await pending;

    const options = mockSpawn.mock.calls[0][2];
    expect(options?.env?.ANACONDA_API_TOKEN).toBe('test-secret');
    expect(process.env.ANACONDA_API_TOKEN).not.toBe('test-secret');
  });

  it('reports 127 when the tool cannot be started', async () => {
    const child = fakeChild();
    const pending = new ProcessRunner().run({ command: 'doctr', args: [] });
    child.emit('error', new Error('spawn doctr ENOENT'));

    expect(await pending).toMatchObject({ exitCode: 127, error: 'spawn doctr ENOENT' });
  });

  it('treats a signal as a failure', async () => {
    const child = fakeChild();
    const pending = new ProcessRunner().run({ command: 'conda', args: ['build'] });
    child.emit('close', null, 'SIGTERM');

    expect(await pending).toMatchObject({ exitCode: 1, error: 'terminated by SIGTERM' });
  });
});

describe('DryRunRunner', () => {
  it('records commands and reports success without spawning', async () => {
    const runner = new DryRunRunner();
    const result = await runner.run({ command: 'anaconda', args: ['upload', 'pkg.tar.bz2'] });

    expect(result.exitCode).toBe(0);
    expect(runner.commands).toEqual([{ command: 'anaconda', args: ['upload', 'pkg.tar.bz2'] }]);
    expect(mockSpawn).not.toHaveBeenCalled();
  });
});
