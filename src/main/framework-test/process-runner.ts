/**
 * Framework Test - Process Runner
 *
 * Runs one external program per call and captures its output.
 * Exit codes are reported, never interpreted.
 */

import { execFileCaptured, isLaunchFailure } from '../utils/execFile';
import { logger } from '../utils/logger';
import { ProcessLaunchError } from './errors';
import type { ProcessResult } from './types';

const LOG_CONTEXT = '[FrameworkTest-Process]';

export interface ProcessRunner {
  /**
   * Run `executable` with `args` in `workingDir`.
   *
   * @param env - Complete environment of the child process
   * @throws ProcessLaunchError when the executable cannot be started
   */
  run(
    executable: string,
    args: readonly string[],
    workingDir: string,
    env: NodeJS.ProcessEnv
  ): Promise<ProcessResult>;
}

export class LocalProcessRunner implements ProcessRunner {
  async run(
    executable: string,
    args: readonly string[],
    workingDir: string,
    env: NodeJS.ProcessEnv
  ): Promise<ProcessResult> {
    logger.debug(`${LOG_CONTEXT} Running: ${executable} ${args.join(' ')} (cwd: ${workingDir})`, LOG_CONTEXT);

    let result: ProcessResult;
    try {
      result = await execFileCaptured(executable, [...args], { cwd: workingDir, env });
    } catch (error) {
      if (isLaunchFailure(error)) {
        throw new ProcessLaunchError(executable, error.message);
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      logger.debug(`${LOG_CONTEXT} ${executable} exited with ${result.exitCode}`, LOG_CONTEXT);
    }
    return result;
  }
}
