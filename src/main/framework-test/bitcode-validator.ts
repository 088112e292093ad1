/**
 * Framework Test - Bitcode Validation
 *
 * Checks full bitcode embedding in a framework binary with bitcode-build-tool.
 * Only full embedding is checked; marker-only builds are skipped.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { ExternalToolFailure, MissingInterpreterError } from './errors';
import type { ProcessRunner } from './process-runner';
import type { TargetMetadataResolver } from './resolver';
import { bitcodeSdkFor, parseTarget } from './targets';
import type { ToolchainProvider } from './toolchain';

const LOG_CONTEXT = '[FrameworkTest-Bitcode]';

export const DEFAULT_INTERPRETER_CANDIDATES = ['/usr/bin/python3', '/usr/local/bin/python3'];

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

export interface BitcodeValidatorOptions {
  /** Interpreter paths probed in order */
  interpreterCandidates?: string[];
  /** Existence check used for probing */
  exists?: (candidate: string) => Promise<boolean>;
  env?: NodeJS.ProcessEnv;
}

export class BitcodeValidator {
  private readonly interpreterCandidates: string[];
  private readonly exists: (candidate: string) => Promise<boolean>;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly resolver: TargetMetadataResolver,
    private readonly toolchain: ToolchainProvider,
    private readonly runner: ProcessRunner,
    options: BitcodeValidatorOptions = {}
  ) {
    this.interpreterCandidates = options.interpreterCandidates ?? DEFAULT_INTERPRETER_CANDIDATES;
    this.exists = options.exists ?? pathExists;
    this.env = options.env ?? process.env;
  }

  /**
   * First existing interpreter among the candidates.
   *
   * @throws MissingInterpreterError
   */
  async findInterpreter(): Promise<string> {
    for (const candidate of this.interpreterCandidates) {
      if (await this.exists(candidate)) {
        return candidate;
      }
    }
    throw new MissingInterpreterError(this.interpreterCandidates);
  }

  async validate(frameworkBinary: string, targetName: string, fullBitcode: boolean): Promise<void> {
    if (!fullBitcode) {
      return;
    }
    const target = parseTarget(targetName);
    const sdkName = bitcodeSdkFor(target);
    if (sdkName === null) {
      logger.debug(`${LOG_CONTEXT} Skipping ${target}: bitcode-build-tool has no simulator support`, LOG_CONTEXT);
      return;
    }

    const metadata = await this.resolver.resolve(target);
    const sdkPath = await this.toolchain.getSdkPath(sdkName);
    const additionalToolsDir = await this.toolchain.getAdditionalToolsDir();
    const bitcodeBuildTool = path.join(additionalToolsDir, 'bin', 'bitcode-build-tool');
    const interpreter = await this.findInterpreter();

    const args = [
      bitcodeBuildTool,
      '--sdk',
      sdkPath,
      '-v',
      '-t',
      metadata.toolchainBinDir,
      frameworkBinary,
    ];
    logger.info(`${LOG_CONTEXT} Validating bitcode in ${frameworkBinary}`, LOG_CONTEXT);

    const result = await this.runner.run(interpreter, args, path.dirname(frameworkBinary), this.env);
    if (result.exitCode !== 0) {
      throw new ExternalToolFailure(
        'bitcode-validator',
        `Bitcode validation failed for ${frameworkBinary}`,
        result,
        `${interpreter} ${args.join(' ')}`
      );
    }
  }
}
