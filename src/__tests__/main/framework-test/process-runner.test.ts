/**
 * Tests for src/main/framework-test/process-runner.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock('child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('child_process')>();
  return {
    ...actual,
    default: { ...actual, execFile: mockExecFile },
    execFile: mockExecFile,
  };
});

vi.mock('../../../main/utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { LocalProcessRunner } from '../../../main/framework-test/process-runner';
import { ProcessLaunchError } from '../../../main/framework-test/errors';

type ExecCallback = (error: Error | null, value?: { stdout: string; stderr: string }) => void;

function execFailure(
  message: string,
  fields: { code?: number | string; signal?: string; stdout?: string; stderr?: string }
): Error {
  return Object.assign(new Error(message), fields);
}

function respond(error: Error | null, stdout = '', stderr = ''): void {
  mockExecFile.mockImplementation(
    (_command: string, _args: string[], _options: object, callback: ExecCallback) => {
      if (error) callback(error);
      else callback(null, { stdout, stderr });
    }
  );
}

describe('LocalProcessRunner', () => {
  const runner = new LocalProcessRunner();

  beforeEach(() => {
    mockExecFile.mockReset();
  });

  it('captures stdout and stderr of a successful run', async () => {
    respond(null, 'all tests passed\n', 'warning: slow\n');

    const result = await runner.run('/bin/tool', ['--flag'], '/work', { PATH: '/bin' });

    expect(result).toEqual({ stdout: 'all tests passed\n', stderr: 'warning: slow\n', exitCode: 0 });
  });

  it('passes the working directory and environment to the child', async () => {
    respond(null);

    await runner.run('/bin/tool', ['a', 'b'], '/work', { PATH: '/bin', DYLD_LIBRARY_PATH: '/lib' });

    expect(mockExecFile).toHaveBeenCalledTimes(1);
    const [command, args, options] = mockExecFile.mock.calls[0];
    expect(command).toBe('/bin/tool');
    expect(args).toEqual(['a', 'b']);
    expect(options).toMatchObject({
      cwd: '/work',
      env: { PATH: '/bin', DYLD_LIBRARY_PATH: '/lib' },
    });
  });

  it('reports a non-zero exit code without throwing', async () => {
    respond(
      execFailure('Command failed: /bin/tool', {
        code: 2,
        stdout: 'partial\n',
        stderr: 'assertion failed\n',
      })
    );

    const result = await runner.run('/bin/tool', [], '/work', {});

    expect(result).toEqual({ stdout: 'partial\n', stderr: 'assertion failed\n', exitCode: 2 });
  });

  it('reports a signal as exit code 1 and names the signal', async () => {
    respond(execFailure('Command failed: /bin/tool', { signal: 'SIGSEGV', stdout: '', stderr: '' }));

    const result = await runner.run('/bin/tool', [], '/work', {});

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Terminated by signal SIGSEGV\n');
  });

  it('throws ProcessLaunchError when the executable is missing', async () => {
    respond(execFailure('spawn /missing/tool ENOENT', { code: 'ENOENT' }));

    const error = await runner.run('/missing/tool', [], '/work', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessLaunchError);
    expect(error).toMatchObject({
      executable: '/missing/tool',
      message: 'Failed to launch /missing/tool: spawn /missing/tool ENOENT',
    });
  });
});
