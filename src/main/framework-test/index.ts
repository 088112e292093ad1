/**
 * Framework Test - Main Module Exports
 *
 * Central export point for building and running framework tests:
 * - Target resolution against the installed toolchain
 * - Bitcode validation and code signing of framework bundles
 * - Provider stub generation and test executable compilation
 * - Test execution and outcome reporting
 */

// =============================================================================
// Type Exports
// =============================================================================

export * from './types';
export * from './errors';

// =============================================================================
// Targets & Toolchain
// =============================================================================

export {
  parseTarget,
  isTarget,
  describeTarget,
  swiftTargetTriple,
  libraryPathVariable,
  bitcodeSdkFor,
} from './targets';
export { XcodeToolchainProvider, parseSimulatorRuntimes } from './toolchain';
export type { ToolchainProvider, ToolchainOverrides } from './toolchain';
export {
  TargetMetadataResolver,
  simulatorRuntimeLibraryPath,
  toolchainDefaultLibraryPath,
} from './resolver';

// =============================================================================
// Processes
// =============================================================================

export { LocalProcessRunner } from './process-runner';
export type { ProcessRunner } from './process-runner';

// =============================================================================
// Build Steps
// =============================================================================

export { BitcodeValidator, DEFAULT_INTERPRETER_CANDIDATES } from './bitcode-validator';
export { providerNameFor, generateProviderStub, writeProviderStub } from './stub-generator';
export { collectSources, Language } from './sources';
export { FrameworkBuildCoordinator, CODESIGN_TOOL } from './framework-coordinator';
export { TestExecutableBuilder, buildCompilerArgs } from './executable-builder';
export {
  computeArtifactPaths,
  frameworkArtifactPaths,
  EXECUTABLE_NAME,
  PROVIDER_FILE_NAME,
} from './paths';

// =============================================================================
// Execution
// =============================================================================

export {
  buildTestEnvironment,
  usesSystemSwiftRuntime,
  DEFAULT_SYSTEM_RUNTIME_POLICY,
} from './environment';
export { TestExecutionDriver } from './driver';
export { createHarness } from './harness';
export type { Harness, HarnessOverrides } from './harness';

// =============================================================================
// Configuration
// =============================================================================

export {
  TestRunConfigBuilder,
  createFramework,
  loadHarnessConfig,
  parseHarnessConfig,
  selectTests,
  DEFAULT_CONFIG_FILE,
} from './config';
export type { FrameworkInput, LoadedConfig, ConfigOverrides } from './config';
