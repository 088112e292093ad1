/**
 * Framework Test - Toolchain Discovery
 *
 * The installed toolchain is reached only through ToolchainProvider so that
 * resolution and validation can run against fakes.
 */

import * as path from 'path';
import { logger } from '../utils/logger';
import { ExternalToolFailure } from './errors';
import type { ProcessRunner } from './process-runner';
import type { PlatformFamily, SimulatorRuntime } from './types';
import { compareVersions, isRecord, parseJson } from './utils';

const LOG_CONTEXT = '[FrameworkTest-Toolchain]';

export interface ToolchainProvider {
  /** Root of the active toolchain (contains usr/bin/swiftc) */
  getToolchainRoot(): Promise<string>;
  /** Directory whose bin/ holds bitcode-build-tool */
  getAdditionalToolsDir(): Promise<string>;
  /** Absolute path of an SDK by name (e.g., "iphoneos") */
  getSdkPath(sdkName: string): Promise<string>;
  /**
   * Newest available simulator runtime for the family at or above minVersion,
   * or undefined when none is installed.
   */
  findLatestSimulatorRuntime(
    family: PlatformFamily,
    minVersion: string
  ): Promise<SimulatorRuntime | undefined>;
  /** Product version of the host OS (e.g., "14.4.1") */
  getHostOsVersion(): Promise<string>;
}

/**
 * Paths that replace discovery when set.
 */
export interface ToolchainOverrides {
  developerDir?: string;
  toolchainRoot?: string;
  additionalToolsDir?: string;
}

const SIMULATOR_PLATFORM_NAMES: Record<PlatformFamily, string | null> = {
  ios: 'iOS',
  tvos: 'tvOS',
  watchos: 'watchOS',
  macos: null,
};

/**
 * Parse `xcrun simctl list runtimes --json` into runtimes of one platform.
 * Older simctl releases omit both `platform` and `bundlePath`; the platform
 * then comes from the runtime name ("iOS 12.1").
 */
export function parseSimulatorRuntimes(output: string, platformName: string): SimulatorRuntime[] {
  const parsed = parseJson(output);
  if (!isRecord(parsed) || !Array.isArray(parsed.runtimes)) {
    throw new SyntaxError('Invalid simctl output: missing runtimes array');
  }

  const entries: unknown[] = parsed.runtimes;
  const runtimes: SimulatorRuntime[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const { identifier, version, name, platform, bundlePath, isAvailable } = entry;
    if (typeof identifier !== 'string' || typeof version !== 'string') continue;
    if (isAvailable === false) continue;

    const entryPlatform =
      typeof platform === 'string' ? platform : typeof name === 'string' ? name.split(' ')[0] : '';
    if (entryPlatform !== platformName) continue;

    runtimes.push({
      identifier,
      version,
      bundlePath: typeof bundlePath === 'string' ? bundlePath : undefined,
    });
  }
  return runtimes;
}

/**
 * ToolchainProvider backed by the Xcode command line tools.
 */
export class XcodeToolchainProvider implements ToolchainProvider {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly overrides: ToolchainOverrides = {},
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  private async query(executable: string, args: string[], what: string): Promise<string> {
    const result = await this.runner.run(executable, args, process.cwd(), this.env);
    if (result.exitCode !== 0) {
      throw new ExternalToolFailure(
        'toolchain',
        `Failed to ${what}`,
        result,
        `${executable} ${args.join(' ')}`
      );
    }
    return result.stdout.trim();
  }

  async getDeveloperDir(): Promise<string> {
    if (this.overrides.developerDir) {
      return this.overrides.developerDir;
    }
    const developerDir = await this.query('xcode-select', ['-p'], 'detect the Xcode developer directory');
    logger.debug(`${LOG_CONTEXT} Developer directory: ${developerDir}`, LOG_CONTEXT);
    return developerDir;
  }

  async getToolchainRoot(): Promise<string> {
    if (this.overrides.toolchainRoot) {
      return this.overrides.toolchainRoot;
    }
    return path.join(await this.getDeveloperDir(), 'Toolchains', 'XcodeDefault.xctoolchain');
  }

  async getAdditionalToolsDir(): Promise<string> {
    if (this.overrides.additionalToolsDir) {
      return this.overrides.additionalToolsDir;
    }
    return path.join(await this.getDeveloperDir(), 'usr');
  }

  async getSdkPath(sdkName: string): Promise<string> {
    return this.query('xcrun', ['--sdk', sdkName, '--show-sdk-path'], `locate the ${sdkName} SDK`);
  }

  async findLatestSimulatorRuntime(
    family: PlatformFamily,
    minVersion: string
  ): Promise<SimulatorRuntime | undefined> {
    const platformName = SIMULATOR_PLATFORM_NAMES[family];
    if (!platformName) {
      return undefined;
    }

    const output = await this.query(
      'xcrun',
      ['simctl', 'list', 'runtimes', '--json'],
      'list simulator runtimes'
    );
    const candidates = parseSimulatorRuntimes(output, platformName)
      .filter((runtime) => compareVersions(runtime.version, minVersion) >= 0)
      .sort((a, b) => compareVersions(b.version, a.version));

    const latest = candidates[0];
    logger.debug(
      `${LOG_CONTEXT} Latest ${platformName} runtime >= ${minVersion}: ${latest ? latest.identifier : 'none'}`,
      LOG_CONTEXT
    );
    return latest;
  }

  async getHostOsVersion(): Promise<string> {
    return this.query('sw_vers', ['-productVersion'], 'read the host OS version');
  }
}
