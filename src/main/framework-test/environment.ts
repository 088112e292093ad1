/**
 * Framework Test - Run Environment
 *
 * Builds the environment delta that points the test binary at the Swift
 * runtime libraries of its target.
 */

import { logger } from '../utils/logger';
import type { TargetMetadataResolver } from './resolver';
import { describeTarget, libraryPathVariable } from './targets';
import type { ToolchainProvider } from './toolchain';
import type { PlatformFamily, SystemRuntimePolicy, Target } from './types';
import { compareVersions } from './utils';

const LOG_CONTEXT = '[FrameworkTest-Environment]';

export const DEFAULT_SYSTEM_RUNTIME_POLICY: SystemRuntimePolicy = {
  enabled: true,
  minHostVersion: '10.14.4',
};

/**
 * Whether the host OS already provides the Swift runtime for this family,
 * in which case overriding the library path would only get in the way.
 */
export function usesSystemSwiftRuntime(
  family: PlatformFamily,
  hostOsVersion: string,
  policy: SystemRuntimePolicy
): boolean {
  return (
    policy.enabled && family === 'macos' && compareVersions(hostOsVersion, policy.minHostVersion) >= 0
  );
}

export async function buildTestEnvironment(
  target: Target,
  resolver: TargetMetadataResolver,
  toolchain: ToolchainProvider,
  policy: SystemRuntimePolicy
): Promise<Record<string, string>> {
  const { family } = describeTarget(target);

  if (policy.enabled && family === 'macos') {
    const hostOsVersion = await toolchain.getHostOsVersion();
    if (usesSystemSwiftRuntime(family, hostOsVersion, policy)) {
      logger.debug(
        `${LOG_CONTEXT} Host ${hostOsVersion} ships the Swift runtime; no library path override`,
        LOG_CONTEXT
      );
      return {};
    }
  }

  const metadata = await resolver.resolve(target);
  return { [libraryPathVariable(target)]: metadata.runtimeLibraryPath };
}
