/**
 * Framework Test - TypeScript Interfaces
 *
 * Core type definitions for building and running a test executable
 * against prebuilt framework bundles.
 */

import type { ExecResult } from '../utils/execFile';
import type { TestExecutionFailure } from './errors';

// =============================================================================
// Targets
// =============================================================================

/**
 * Every target the harness knows how to build and run for.
 */
export const TARGETS = [
  'ios_x64',
  'ios_arm32',
  'ios_arm64',
  'tvos_x64',
  'tvos_arm64',
  'macos_x64',
  'watchos_arm32',
  'watchos_arm64',
  'watchos_x64',
  'watchos_x86',
] as const;

export type Target = (typeof TARGETS)[number];

export type PlatformFamily = 'ios' | 'tvos' | 'watchos' | 'macos';

/**
 * Static facts about a target that need no installed toolchain.
 */
export interface TargetDescriptor {
  target: Target;
  family: PlatformFamily;
  /** Architecture as spelled in a Swift target triple (e.g., "arm64_32") */
  architecture: string;
  /** Whether binaries run inside a simulator */
  simulator: boolean;
  /** SDK name as understood by xcrun (e.g., "iphonesimulator") */
  sdkName: string;
  /** Minimum OS version the binaries are built for */
  osVersionMin: string;
}

/**
 * Facts about a target resolved against the installed toolchain.
 */
export interface PlatformMetadata extends TargetDescriptor {
  /** Absolute path of the SDK (value of swiftc -sdk) */
  sdkPath: string;
  /** Root of the toolchain (e.g., .../XcodeDefault.xctoolchain) */
  toolchainRoot: string;
  /** Directory holding swiftc and friends, with a trailing slash */
  toolchainBinDir: string;
  /** Swift target triple (e.g., "x86_64-apple-ios9.0") */
  swiftTarget: string;
  /** Directory holding the Swift runtime libraries the test binary loads */
  runtimeLibraryPath: string;
  /** Which branch produced runtimeLibraryPath */
  runtimeLibrarySource: 'simulator-runtime' | 'toolchain-default';
  /** Simulator runtime bundle, when the toolchain exposed one */
  simulatorRuntimeBundlePath?: string;
}

/**
 * Simulator runtime reported by the toolchain.
 */
export interface SimulatorRuntime {
  /** Runtime identifier (e.g., "com.apple.CoreSimulator.SimRuntime.iOS-17-5") */
  identifier: string;
  /** Runtime version (e.g., "17.5") */
  version: string;
  /** Path of the runtime bundle; missing on older toolchains */
  bundlePath?: string;
}

// =============================================================================
// Test Configuration
// =============================================================================

/**
 * Description of one prebuilt framework the test links against.
 */
export interface FrameworkDescriptor {
  /** Framework name */
  readonly name: string;
  /** Framework sources (built elsewhere; kept for reporting) */
  readonly sources: readonly string[];
  /** Whether the framework embeds bitcode */
  readonly bitcode: boolean;
  /** Name of the resulting artifact */
  readonly artifact: string;
  /** Library dependency name */
  readonly library?: string;
  /** Additional compiler options used when the framework was built */
  readonly opts: readonly string[];
}

/**
 * Everything needed to build and run one declared test.
 */
export interface TestRunConfig {
  readonly testName: string;
  /** Swift test sources: files, or directories searched for .swift files */
  readonly testSources: readonly string[];
  /** Frameworks in link order; never empty */
  readonly frameworks: readonly FrameworkDescriptor[];
  readonly fullBitcode: boolean;
  readonly codesign: boolean;
}

/**
 * Settings shared by every run in one harness invocation.
 */
export interface HarnessSettings {
  /** Root directory for per-test outputs */
  outputRoot: string;
  target: Target;
  /** Harness entry point compiled into every test executable */
  harnessSource: string;
  /** Signing identity passed to codesign -s */
  codesignIdentity: string;
  /** Interpreter paths probed in order for bitcode validation */
  interpreterCandidates: string[];
  systemRuntimePolicy: SystemRuntimePolicy;
  /** Simulator device used with `xcrun simctl spawn`; direct launch when unset */
  simulatorDevice?: string;
}

/**
 * Hosts at or above minHostVersion ship the Swift runtime for macOS targets,
 * so the library path override is left out there.
 */
export type SystemRuntimePolicy = { enabled: true; minHostVersion: string } | { enabled: false };

// =============================================================================
// Processes & Artifacts
// =============================================================================

export type ProcessResult = ExecResult;

/**
 * Paths derived from (outputRoot, testName, target); recomputed every run.
 */
export interface BuildArtifactPaths {
  /** {outputRoot}/{testName} */
  testDir: string;
  /** {outputRoot}/{testName}/{target}: parent of every framework bundle */
  frameworkParentDir: string;
  /** Generated provider stub */
  providerPath: string;
  /** Final test executable */
  executablePath: string;
}

export interface FrameworkArtifactPaths {
  /** {frameworkParentDir}/{artifact}.framework */
  bundleDir: string;
  /** {bundleDir}/{artifact} */
  binaryPath: string;
}

// =============================================================================
// Execution
// =============================================================================

export type TestRunState = 'NotBuilt' | 'Built' | 'Ran' | 'Passed' | 'Failed';

/**
 * Result of running a built test executable.
 */
export interface TestOutcome {
  testName: string;
  state: 'Passed' | 'Failed';
  executablePath: string;
  result: ProcessResult;
  /** Library path delta applied on top of the inherited environment */
  environment: Record<string, string>;
  durationMs: number;
  /** Set when state is 'Failed' */
  failure?: TestExecutionFailure;
}
