/**
 * Framework Test - Framework Build Coordinator
 *
 * Prepares the prebuilt frameworks of a test for linking: checks that each
 * bundle exists, validates its bitcode, and code-signs it. The first failure
 * aborts the whole run.
 */

import * as fs from 'fs/promises';
import { logger } from '../utils/logger';
import type { BitcodeValidator } from './bitcode-validator';
import { ExternalToolFailure, FrameworkNotFoundError } from './errors';
import { frameworkArtifactPaths } from './paths';
import type { ProcessRunner } from './process-runner';
import type { BuildArtifactPaths, Target, TestRunConfig } from './types';

const LOG_CONTEXT = '[FrameworkTest-Frameworks]';

export const CODESIGN_TOOL = '/usr/bin/codesign';

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

export interface FrameworkCoordinatorOptions {
  /** Identity for codesign -s; "-" signs ad hoc */
  codesignIdentity?: string;
  env?: NodeJS.ProcessEnv;
}

export class FrameworkBuildCoordinator {
  private readonly codesignIdentity: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly validator: BitcodeValidator,
    private readonly runner: ProcessRunner,
    options: FrameworkCoordinatorOptions = {}
  ) {
    this.codesignIdentity = options.codesignIdentity ?? '-';
    this.env = options.env ?? process.env;
  }

  async coordinate(config: TestRunConfig, target: Target, paths: BuildArtifactPaths): Promise<void> {
    for (const framework of config.frameworks) {
      const { bundleDir, binaryPath } = frameworkArtifactPaths(
        paths.frameworkParentDir,
        framework.artifact
      );

      if (!(await isDirectory(bundleDir))) {
        throw new FrameworkNotFoundError(framework.name, bundleDir);
      }

      await this.validator.validate(binaryPath, target, config.fullBitcode);
      if (config.codesign) {
        await this.codesign(bundleDir, paths.testDir);
      }
      logger.debug(`${LOG_CONTEXT} Framework ${framework.name} ready: ${bundleDir}`, LOG_CONTEXT);
    }
  }

  async codesign(bundleDir: string, workingDir: string): Promise<void> {
    const args = ['--verbose', '-s', this.codesignIdentity, bundleDir];
    const result = await this.runner.run(CODESIGN_TOOL, args, workingDir, this.env);
    if (result.exitCode !== 0) {
      throw new ExternalToolFailure(
        'codesign',
        `Codesign failed with exit code: ${result.exitCode}`,
        result,
        `${CODESIGN_TOOL} ${args.join(' ')}`
      );
    }
    logger.info(`${LOG_CONTEXT} Signed ${bundleDir}`, LOG_CONTEXT);
  }
}
