/**
 * Framework Test - Test Executable Builder
 *
 * Compiles the Swift test sources, the generated provider stub and the harness
 * entry point into one executable linked against the test's frameworks.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { ExternalToolFailure, formatCapturedOutput } from './errors';
import type { FrameworkBuildCoordinator } from './framework-coordinator';
import { computeArtifactPaths } from './paths';
import type { ProcessRunner } from './process-runner';
import type { TargetMetadataResolver } from './resolver';
import { collectSources, Language } from './sources';
import { writeProviderStub } from './stub-generator';
import type { BuildArtifactPaths, PlatformMetadata, Target, TestRunConfig } from './types';

const LOG_CONTEXT = '[FrameworkTest-Builder]';

export interface ExecutableBuilderSettings {
  outputRoot: string;
  target: Target;
  /** Harness main.swift compiled into every executable */
  harnessSource: string;
}

/**
 * swiftc arguments for the test executable.
 */
export function buildCompilerArgs(
  metadata: PlatformMetadata,
  paths: BuildArtifactPaths,
  sources: readonly string[],
  fullBitcode: boolean
): string[] {
  const frameworkDir = paths.frameworkParentDir;
  return [
    '-sdk', metadata.sdkPath,
    '-target', metadata.swiftTarget,
    '-g',
    '-Xlinker', '-rpath', '-Xlinker', '@executable_path/Frameworks',
    '-Xlinker', '-rpath', '-Xlinker', frameworkDir,
    '-F', frameworkDir,
    '-Xcc', '-Werror', // fail on warnings in framework headers
    '-o', paths.executablePath,
    ...sources,
    ...(fullBitcode ? ['-embed-bitcode', '-Xlinker', '-bitcode_verify'] : ['-embed-bitcode-marker']),
  ];
}

export class TestExecutableBuilder {
  constructor(
    private readonly resolver: TargetMetadataResolver,
    private readonly coordinator: FrameworkBuildCoordinator,
    private readonly runner: ProcessRunner,
    private readonly settings: ExecutableBuilderSettings,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  executablePath(config: TestRunConfig): string {
    return computeArtifactPaths(this.settings.outputRoot, config.testName, this.settings.target)
      .executablePath;
  }

  async build(config: TestRunConfig): Promise<string> {
    const { outputRoot, target, harnessSource } = this.settings;
    const paths = computeArtifactPaths(outputRoot, config.testName, target);

    await this.coordinator.coordinate(config, target, paths);

    const testSources = await collectSources(config.testSources, Language.Swift);
    await writeProviderStub(paths.providerPath, testSources);
    logger.debug(`${LOG_CONTEXT} Wrote ${paths.providerPath} (${testSources.length} providers)`, LOG_CONTEXT);

    const metadata = await this.resolver.resolve(target);
    const sources = [...testSources, paths.providerPath, harnessSource];
    const args = buildCompilerArgs(metadata, paths, sources, config.fullBitcode);
    const compiler = path.join(metadata.toolchainBinDir, 'swiftc');

    logger.info(`${LOG_CONTEXT} Compiling ${config.testName} for ${target}`, LOG_CONTEXT);
    const result = await this.runner.run(compiler, args, paths.testDir, this.env);
    logger.debug(`${LOG_CONTEXT} swiftc ${config.testName}\n${formatCapturedOutput(result)}`, LOG_CONTEXT);

    const command = `${compiler} ${args.join(' ')}`;
    if (result.exitCode !== 0) {
      throw new ExternalToolFailure('compiler', 'Compilation failed', result, command);
    }
    try {
      await fs.access(paths.executablePath);
    } catch {
      throw new ExternalToolFailure(
        'compiler',
        `Compiler swiftc hasn't produced an output file: ${paths.executablePath}`,
        result,
        command
      );
    }

    return paths.executablePath;
  }
}
