/**
 * Framework Test - Target Metadata Resolver
 *
 * Maps a target to the SDK, toolchain and Swift runtime locations
 * reported by the installed toolchain.
 */

import * as path from 'path';
import { logger } from '../utils/logger';
import { describeTarget, parseTarget, swiftTargetTriple } from './targets';
import type { ToolchainProvider } from './toolchain';
import type { PlatformMetadata } from './types';

const LOG_CONTEXT = '[FrameworkTest-Resolver]';

export function simulatorRuntimeLibraryPath(bundlePath: string): string {
  return path.join(bundlePath, 'Contents', 'Resources', 'RuntimeRoot', 'usr', 'lib', 'swift');
}

/**
 * Swift runtime shipped with the toolchain itself. Device and desktop targets
 * always use it; simulators fall back to it when the toolchain exposes no
 * simulator runtime bundle (older Xcode/macOS installs).
 */
export function toolchainDefaultLibraryPath(toolchainRoot: string, sdkName: string): string {
  return path.join(toolchainRoot, 'usr', 'lib', 'swift-5.0', sdkName);
}

export class TargetMetadataResolver {
  constructor(private readonly toolchain: ToolchainProvider) {}

  /**
   * @throws UnsupportedTargetError before touching the toolchain when the
   *   target is unknown
   */
  async resolve(targetName: string): Promise<PlatformMetadata> {
    const descriptor = describeTarget(parseTarget(targetName));

    const toolchainRoot = await this.toolchain.getToolchainRoot();
    const sdkPath = await this.toolchain.getSdkPath(descriptor.sdkName);
    const runtime = descriptor.simulator
      ? await this.toolchain.findLatestSimulatorRuntime(descriptor.family, descriptor.osVersionMin)
      : undefined;

    const metadata: PlatformMetadata = {
      ...descriptor,
      sdkPath,
      toolchainRoot,
      toolchainBinDir: `${path.join(toolchainRoot, 'usr', 'bin')}/`,
      swiftTarget: swiftTargetTriple(descriptor),
      runtimeLibraryPath: toolchainDefaultLibraryPath(toolchainRoot, descriptor.sdkName),
      runtimeLibrarySource: 'toolchain-default',
    };

    if (runtime?.bundlePath) {
      metadata.runtimeLibraryPath = simulatorRuntimeLibraryPath(runtime.bundlePath);
      metadata.runtimeLibrarySource = 'simulator-runtime';
      metadata.simulatorRuntimeBundlePath = runtime.bundlePath;
    } else if (descriptor.simulator) {
      logger.warn(
        `${LOG_CONTEXT} No simulator runtime bundle for ${descriptor.target}; using toolchain runtime libraries`,
        LOG_CONTEXT
      );
    }

    logger.debug(
      `${LOG_CONTEXT} ${descriptor.target}: sdk=${sdkPath} runtime=${metadata.runtimeLibraryPath}`,
      LOG_CONTEXT
    );
    return metadata;
  }
}
