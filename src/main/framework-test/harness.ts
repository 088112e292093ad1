/**
 * Framework Test - Harness Wiring
 *
 * Assembles the components of a harness invocation from its settings.
 * Tests replace the runner and the toolchain with fakes.
 */

import { BitcodeValidator } from './bitcode-validator';
import { TestExecutableBuilder } from './executable-builder';
import { FrameworkBuildCoordinator } from './framework-coordinator';
import { LocalProcessRunner, type ProcessRunner } from './process-runner';
import { TargetMetadataResolver } from './resolver';
import { XcodeToolchainProvider, type ToolchainOverrides, type ToolchainProvider } from './toolchain';
import type { HarnessSettings } from './types';

export interface Harness {
  settings: HarnessSettings;
  runner: ProcessRunner;
  toolchain: ToolchainProvider;
  resolver: TargetMetadataResolver;
  validator: BitcodeValidator;
  coordinator: FrameworkBuildCoordinator;
  builder: TestExecutableBuilder;
  /** Environment every child process inherits */
  env: NodeJS.ProcessEnv;
}

export interface HarnessOverrides {
  runner?: ProcessRunner;
  toolchain?: ToolchainProvider;
  toolchainOverrides?: ToolchainOverrides;
  env?: NodeJS.ProcessEnv;
  /** Existence check used when probing interpreters */
  exists?: (candidate: string) => Promise<boolean>;
}

export function createHarness(settings: HarnessSettings, overrides: HarnessOverrides = {}): Harness {
  const env = overrides.env ?? process.env;
  const runner = overrides.runner ?? new LocalProcessRunner();
  const toolchain =
    overrides.toolchain ?? new XcodeToolchainProvider(runner, overrides.toolchainOverrides, env);
  const resolver = new TargetMetadataResolver(toolchain);
  const validator = new BitcodeValidator(resolver, toolchain, runner, {
    interpreterCandidates: settings.interpreterCandidates,
    exists: overrides.exists,
    env,
  });
  const coordinator = new FrameworkBuildCoordinator(validator, runner, {
    codesignIdentity: settings.codesignIdentity,
    env,
  });
  const builder = new TestExecutableBuilder(
    resolver,
    coordinator,
    runner,
    {
      outputRoot: settings.outputRoot,
      target: settings.target,
      harnessSource: settings.harnessSource,
    },
    env
  );

  return { settings, runner, toolchain, resolver, validator, coordinator, builder, env };
}
