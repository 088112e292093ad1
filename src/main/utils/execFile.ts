import { execFile, type ExecFileException } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

// Maximum buffer size for command output (64MB); test binaries can be chatty
const EXEC_MAX_BUFFER = 64 * 1024 * 1024;

// errno codes meaning the child never started
const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'ENOEXEC', 'ENOTDIR']);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  /** Complete environment of the child; replaces the parent environment */
  env?: NodeJS.ProcessEnv;
}

interface ExecFailure extends ExecFileException {
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

/**
 * Whether an error thrown by execFileCaptured means the executable could not be started.
 */
export function isLaunchFailure(error: unknown): error is ExecFailure {
  return (
    isExecFailure(error) && typeof error.code === 'string' && LAUNCH_ERROR_CODES.has(error.code)
  );
}

/**
 * Execute a command without a shell and capture stdout/stderr separately.
 * A non-zero exit resolves with that exit code; a launch failure rejects
 * with the original spawn error (see isLaunchFailure).
 */
export async function execFileCaptured(
  command: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env,
      encoding: 'utf8',
      maxBuffer: EXEC_MAX_BUFFER,
    });

    return {
      stdout,
      stderr,
      exitCode: 0,
    };
  } catch (error: unknown) {
    if (isLaunchFailure(error) || !isExecFailure(error)) {
      throw error;
    }
    // execFile rejects on non-zero exit codes
    const signal = error.signal ? `Terminated by signal ${error.signal}\n` : '';
    return {
      stdout: error.stdout ?? '',
      stderr: `${signal}${error.stderr ?? ''}` || error.message,
      exitCode: typeof error.code === 'number' ? error.code : 1,
    };
  }
}
