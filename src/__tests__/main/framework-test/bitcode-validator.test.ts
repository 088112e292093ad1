/**
 * Tests for src/main/framework-test/bitcode-validator.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../main/utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { BitcodeValidator } from '../../../main/framework-test/bitcode-validator';
import { TargetMetadataResolver } from '../../../main/framework-test/resolver';
import {
  ExternalToolFailure,
  MissingInterpreterError,
  UnsupportedTargetError,
} from '../../../main/framework-test/errors';
import {
  ADDITIONAL_TOOLS_DIR,
  FakeProcessRunner,
  FakeToolchain,
  TOOLCHAIN_ROOT,
  processResult,
} from './fakes';

const BINARY = '/out/values/ios_arm64/Values.framework/Values';

describe('BitcodeValidator', () => {
  let toolchain: FakeToolchain;
  let runner: FakeProcessRunner;
  let existing: Set<string>;

  function createValidator(interpreterCandidates?: string[]): BitcodeValidator {
    return new BitcodeValidator(new TargetMetadataResolver(toolchain), toolchain, runner, {
      interpreterCandidates,
      exists: async (candidate) => existing.has(candidate),
      env: { PATH: '/usr/bin' },
    });
  }

  beforeEach(() => {
    toolchain = new FakeToolchain();
    runner = new FakeProcessRunner();
    existing = new Set(['/usr/bin/python3']);
  });

  describe('findInterpreter', () => {
    it('returns the first existing candidate', async () => {
      existing = new Set(['/usr/bin/python3', '/usr/local/bin/python3']);

      await expect(createValidator().findInterpreter()).resolves.toBe('/usr/bin/python3');
    });

    it('falls back to later candidates', async () => {
      existing = new Set(['/usr/local/bin/python3']);

      await expect(createValidator().findInterpreter()).resolves.toBe('/usr/local/bin/python3');
    });

    it('throws MissingInterpreterError naming every candidate', async () => {
      existing = new Set();

      const error = await createValidator(['/a/python3', '/b/python3'])
        .findInterpreter()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingInterpreterError);
      expect(error).toMatchObject({
        message: "Can't find python3 (looked in: /a/python3, /b/python3)",
      });
    });
  });

  describe('validate', () => {
    it('does nothing when full bitcode is off', async () => {
      await createValidator().validate(BINARY, 'ios_arm64', false);

      expect(runner.calls).toHaveLength(0);
      expect(toolchain.getToolchainRoot).not.toHaveBeenCalled();
    });

    it('skips simulator targets', async () => {
      await createValidator().validate(BINARY, 'ios_x64', true);

      expect(runner.calls).toHaveLength(0);
      expect(toolchain.getSdkPath).not.toHaveBeenCalled();
    });

    it('runs bitcode-build-tool against the framework binary', async () => {
      await createValidator().validate(BINARY, 'ios_arm64', true);

      expect(runner.calls).toHaveLength(1);
      expect(runner.calls[0]).toEqual({
        executable: '/usr/bin/python3',
        args: [
          `${ADDITIONAL_TOOLS_DIR}/bin/bitcode-build-tool`,
          '--sdk',
          '/sdks/iphoneos.sdk',
          '-v',
          '-t',
          `${TOOLCHAIN_ROOT}/usr/bin/`,
          BINARY,
        ],
        workingDir: '/out/values/ios_arm64/Values.framework',
        env: { PATH: '/usr/bin' },
      });
    });

    it('uses the macOS SDK for macos_x64', async () => {
      await createValidator().validate('/out/t/macos_x64/A.framework/A', 'macos_x64', true);

      expect(runner.calls[0].args[2]).toBe('/sdks/macosx.sdk');
    });

    it('asks the toolchain for the bitcode SDK of the target', async () => {
      await createValidator().validate('/out/t/tvos_arm64/A.framework/A', 'tvos_arm64', true);

      expect(toolchain.getSdkPath).toHaveBeenLastCalledWith('appletvos');
      expect(runner.calls[0].args.slice(1, 3)).toEqual(['--sdk', '/sdks/appletvos.sdk']);
    });

    it('throws ExternalToolFailure with the captured output on failure', async () => {
      runner.respondWith(() => processResult(1, 'checking...', 'error: missing bitcode section'));

      const error = await createValidator()
        .validate(BINARY, 'ios_arm64', true)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalToolFailure);
      expect(error).toMatchObject({
        tool: 'bitcode-validator',
        message: `Bitcode validation failed for ${BINARY}\nexit code: 1\nstdout: checking...\nstderr: error: missing bitcode section`,
      });
    });

    it('throws MissingInterpreterError before running anything', async () => {
      existing = new Set();

      await expect(createValidator().validate(BINARY, 'ios_arm64', true)).rejects.toBeInstanceOf(
        MissingInterpreterError
      );
      expect(runner.calls).toHaveLength(0);
    });

    it('rejects unknown targets', async () => {
      await expect(createValidator().validate(BINARY, 'linux_x64', true)).rejects.toBeInstanceOf(
        UnsupportedTargetError
      );
    });
  });
});
