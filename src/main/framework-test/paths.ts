/**
 * Framework Test - Artifact Paths
 *
 * Every path of a run is namespaced by test name under the output root;
 * two runs of the same test must not overlap.
 */

import * as path from 'path';
import type { BuildArtifactPaths, FrameworkArtifactPaths, Target } from './types';

export const EXECUTABLE_NAME = 'swiftTestExecutable';
export const PROVIDER_FILE_NAME = 'provider.swift';

export function computeArtifactPaths(
  outputRoot: string,
  testName: string,
  target: Target
): BuildArtifactPaths {
  const testDir = path.join(outputRoot, testName);
  return {
    testDir,
    frameworkParentDir: path.join(testDir, target),
    providerPath: path.join(testDir, PROVIDER_FILE_NAME),
    executablePath: path.join(testDir, EXECUTABLE_NAME),
  };
}

export function frameworkArtifactPaths(
  frameworkParentDir: string,
  artifact: string
): FrameworkArtifactPaths {
  const bundleDir = path.join(frameworkParentDir, `${artifact}.framework`);
  return {
    bundleDir,
    binaryPath: path.join(bundleDir, artifact),
  };
}
