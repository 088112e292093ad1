/**
 * Tests for src/main/framework-test/executable-builder.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../main/utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { BitcodeValidator } from '../../../main/framework-test/bitcode-validator';
import { TestRunConfigBuilder } from '../../../main/framework-test/config';
import {
  TestExecutableBuilder,
  buildCompilerArgs,
} from '../../../main/framework-test/executable-builder';
import { FrameworkBuildCoordinator } from '../../../main/framework-test/framework-coordinator';
import { ExternalToolFailure } from '../../../main/framework-test/errors';
import { computeArtifactPaths } from '../../../main/framework-test/paths';
import { TargetMetadataResolver } from '../../../main/framework-test/resolver';
import type { PlatformMetadata, TestRunConfig } from '../../../main/framework-test/types';
import {
  FakeProcessRunner,
  FakeToolchain,
  TOOLCHAIN_ROOT,
  cleanupTestDir,
  compilerWritesOutput,
  createFrameworkBundle,
  createTestDir,
  processResult,
} from './fakes';

const METADATA: PlatformMetadata = {
  target: 'ios_arm64',
  family: 'ios',
  architecture: 'arm64',
  simulator: false,
  sdkName: 'iphoneos',
  osVersionMin: '9.0',
  sdkPath: '/sdks/iphoneos.sdk',
  toolchainRoot: TOOLCHAIN_ROOT,
  toolchainBinDir: `${TOOLCHAIN_ROOT}/usr/bin/`,
  swiftTarget: 'arm64-apple-ios9.0',
  runtimeLibraryPath: `${TOOLCHAIN_ROOT}/usr/lib/swift-5.0/iphoneos`,
  runtimeLibrarySource: 'toolchain-default',
};

describe('buildCompilerArgs', () => {
  const paths = computeArtifactPaths('/out', 'values', 'ios_arm64');

  it('links against the framework directory and embeds a bitcode marker', () => {
    expect(buildCompilerArgs(METADATA, paths, ['/src/a.swift', '/out/values/provider.swift'], false)).toEqual([
      '-sdk', '/sdks/iphoneos.sdk',
      '-target', 'arm64-apple-ios9.0',
      '-g',
      '-Xlinker', '-rpath', '-Xlinker', '@executable_path/Frameworks',
      '-Xlinker', '-rpath', '-Xlinker', '/out/values/ios_arm64',
      '-F', '/out/values/ios_arm64',
      '-Xcc', '-Werror',
      '-o', '/out/values/swiftTestExecutable',
      '/src/a.swift', '/out/values/provider.swift',
      '-embed-bitcode-marker',
    ]);
  });

  it('embeds and verifies full bitcode when requested', () => {
    const args = buildCompilerArgs(METADATA, paths, ['/src/a.swift'], true);

    expect(args.slice(-3)).toEqual(['-embed-bitcode', '-Xlinker', '-bitcode_verify']);
    expect(args).not.toContain('-embed-bitcode-marker');
  });
});

describe('TestExecutableBuilder', () => {
  let workDir: string;
  let outputRoot: string;
  let sourceDir: string;
  let runner: FakeProcessRunner;
  let builder: TestExecutableBuilder;

  const testDir = () => path.join(outputRoot, 'values');

  function config(sources: string[]): TestRunConfig {
    return new TestRunConfigBuilder()
      .testName('values')
      .testSources(sources)
      .addFramework({ name: 'Values' })
      .codesign(false)
      .build();
  }

  beforeEach(() => {
    workDir = createTestDir();
    outputRoot = path.join(workDir, 'out');
    sourceDir = path.join(workDir, 'src');
    fs.mkdirSync(sourceDir, { recursive: true });
    fs.writeFileSync(path.join(sourceDir, 'values.swift'), '');
    createFrameworkBundle(outputRoot, 'values', 'macos_x64', 'Values');

    runner = new FakeProcessRunner(compilerWritesOutput);
    const toolchain = new FakeToolchain();
    const resolver = new TargetMetadataResolver(toolchain);
    const coordinator = new FrameworkBuildCoordinator(
      new BitcodeValidator(resolver, toolchain, runner),
      runner
    );
    builder = new TestExecutableBuilder(
      resolver,
      coordinator,
      runner,
      { outputRoot, target: 'macos_x64', harnessSource: '/harness/main.swift' },
      { PATH: '/usr/bin' }
    );
  });

  afterEach(() => {
    cleanupTestDir(workDir);
  });

  it('reports where the executable will be written', () => {
    expect(builder.executablePath(config(['/src/values.swift']))).toBe(
      path.join(outputRoot, 'values', 'swiftTestExecutable')
    );
  });

  it('compiles test sources, the provider stub and the harness into one executable', async () => {
    const source = path.join(sourceDir, 'values.swift');

    const executable = await builder.build(config([source]));

    expect(executable).toBe(path.join(testDir(), 'swiftTestExecutable'));
    expect(runner.calls).toHaveLength(1);
    const [call] = runner.calls;
    expect(call.executable).toBe(`${TOOLCHAIN_ROOT}/usr/bin/swiftc`);
    expect(call.workingDir).toBe(testDir());
    expect(call.env).toEqual({ PATH: '/usr/bin' });
    expect(call.args.slice(0, 4)).toEqual(['-sdk', '/sdks/macosx.sdk', '-target', 'x86_64-apple-macosx10.11']);

    const outputIndex = call.args.indexOf('-o');
    expect(call.args.slice(outputIndex + 2)).toEqual([
      source,
      path.join(testDir(), 'provider.swift'),
      '/harness/main.swift',
      '-embed-bitcode-marker',
    ]);
  });

  it('writes a provider stub naming each test source', async () => {
    await builder.build(config([path.join(sourceDir, 'values.swift')]));

    const stub = fs.readFileSync(path.join(testDir(), 'provider.swift'), 'utf8');
    expect(stub).toContain('func registerProviders() {\n    ValuesTests()\n}\n');
  });

  it('expands source directories into sorted Swift files', async () => {
    fs.writeFileSync(path.join(sourceDir, 'arrays.swift'), '');
    fs.writeFileSync(path.join(sourceDir, 'notes.txt'), '');

    await builder.build(config([sourceDir]));

    const args = runner.calls[0].args;
    const outputIndex = args.indexOf('-o');
    expect(args.slice(outputIndex + 2, outputIndex + 4)).toEqual([
      path.join(sourceDir, 'arrays.swift'),
      path.join(sourceDir, 'values.swift'),
    ]);
  });

  it('throws ExternalToolFailure when the compiler fails', async () => {
    runner.respondWith(() => processResult(1, '', "error: cannot find 'Values' in scope"));

    const error = await builder
      .build(config([path.join(sourceDir, 'values.swift')]))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalToolFailure);
    expect(error).toMatchObject({
      tool: 'compiler',
      message: "Compilation failed\nexit code: 1\nstdout: \nstderr: error: cannot find 'Values' in scope",
    });
  });

  it('throws ExternalToolFailure when the compiler writes no executable', async () => {
    runner.respondWith(() => processResult(0));

    const error = await builder
      .build(config([path.join(sourceDir, 'values.swift')]))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalToolFailure);
    expect(String(error)).toContain(
      `Compiler swiftc hasn't produced an output file: ${path.join(testDir(), 'swiftTestExecutable')}`
    );
  });

  it('does not compile when a framework is missing', async () => {
    fs.rmSync(path.join(testDir(), 'macos_x64'), { recursive: true });

    await expect(builder.build(config([path.join(sourceDir, 'values.swift')]))).rejects.toThrow(
      'Framework Values not found'
    );
    expect(runner.calls).toHaveLength(0);
  });
});
