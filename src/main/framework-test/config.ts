/**
 * Framework Test - Configuration
 *
 * TestRunConfigBuilder assembles a validated, immutable TestRunConfig.
 * loadHarnessConfig reads the YAML file that declares the harness settings
 * and the tests to run.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { DEFAULT_INTERPRETER_CANDIDATES } from './bitcode-validator';
import { DEFAULT_SYSTEM_RUNTIME_POLICY } from './environment';
import { ConfigValidationError } from './errors';
import { parseTarget } from './targets';
import type { ToolchainOverrides } from './toolchain';
import type {
  FrameworkDescriptor,
  HarnessSettings,
  SystemRuntimePolicy,
  TestRunConfig,
} from './types';
import { isRecord } from './utils';

// =============================================================================
// Builder
// =============================================================================

export interface FrameworkInput {
  name: string;
  sources?: readonly string[];
  bitcode?: boolean;
  /** Defaults to name */
  artifact?: string;
  library?: string;
  opts?: readonly string[];
}

export function createFramework(input: FrameworkInput): FrameworkDescriptor {
  if (!input.name) {
    throw new ConfigValidationError('Framework name should be set');
  }
  return Object.freeze({
    name: input.name,
    sources: Object.freeze([...(input.sources ?? [])]),
    bitcode: input.bitcode ?? false,
    artifact: input.artifact ?? input.name,
    library: input.library,
    opts: Object.freeze([...(input.opts ?? [])]),
  });
}

export class TestRunConfigBuilder {
  private name?: string;
  private sources?: string[];
  private frameworks: FrameworkDescriptor[] = [];
  private fullBitcodeEnabled = false;
  private codesignEnabled = true;

  testName(name: string): this {
    this.name = name;
    return this;
  }

  testSources(sources: readonly string[]): this {
    this.sources = [...sources];
    return this;
  }

  addFramework(input: FrameworkInput): this {
    this.frameworks.push(createFramework(input));
    return this;
  }

  fullBitcode(enabled = true): this {
    this.fullBitcodeEnabled = enabled;
    return this;
  }

  codesign(enabled = true): this {
    this.codesignEnabled = enabled;
    return this;
  }

  /**
   * @throws ConfigValidationError naming the first missing field
   */
  build(): TestRunConfig {
    if (!this.name) {
      throw new ConfigValidationError('Test name should be set');
    }
    if (/[/\\]/.test(this.name) || this.name === '.' || this.name === '..') {
      throw new ConfigValidationError(`Test name must be a single path segment: ${this.name}`);
    }
    if (!this.sources || this.sources.length === 0) {
      throw new ConfigValidationError(`Test sources should be set for ${this.name}`);
    }
    if (this.frameworks.length === 0) {
      throw new ConfigValidationError(`Frameworks should be set for ${this.name}`);
    }

    return Object.freeze({
      testName: this.name,
      testSources: Object.freeze([...this.sources]),
      frameworks: Object.freeze([...this.frameworks]),
      fullBitcode: this.fullBitcodeEnabled,
      codesign: this.codesignEnabled,
    });
  }
}

// =============================================================================
// Config File
// =============================================================================

export const DEFAULT_CONFIG_FILE = 'fwtest.yaml';
export const DEFAULT_OUTPUT_ROOT = 'build/test-output';
export const DEFAULT_HARNESS_SOURCE = 'harness/main.swift';

export interface LoadedConfig {
  configPath: string;
  settings: HarnessSettings;
  toolchain: ToolchainOverrides;
  tests: TestRunConfig[];
}

/**
 * Values that win over the file: CLI flags, then environment variables.
 */
export interface ConfigOverrides {
  target?: string;
  outputRoot?: string;
}

type Fields = Record<string, unknown>;

function optionalString(fields: Fields, key: string, where: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigValidationError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(fields: Fields, key: string, where: string): boolean | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(`${where}: '${key}' must be a boolean`);
  }
  return value;
}

function optionalStringArray(fields: Fields, key: string, where: string): string[] | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError(`${where}: '${key}' must be an array of strings`);
  }
  const items: unknown[] = value;
  return items.map((item, index) => {
    if (typeof item !== 'string') {
      throw new ConfigValidationError(`${where}: '${key}[${index}]' must be a string`);
    }
    return item;
  });
}

function parseRuntimePolicy(fields: Fields): SystemRuntimePolicy {
  const value = fields.systemRuntimeMinHostVersion;
  if (value === undefined || value === null) return DEFAULT_SYSTEM_RUNTIME_POLICY;
  if (value === false) return { enabled: false };
  if (typeof value === 'string' && /^\d+(\.\d+)*$/.test(value)) {
    return { enabled: true, minHostVersion: value };
  }
  if (typeof value === 'number') {
    // YAML reads 10.10 as the number 10.1
    throw new ConfigValidationError(
      `'systemRuntimeMinHostVersion' must be quoted (e.g. "${value}"); unquoted versions lose trailing zeros`
    );
  }
  throw new ConfigValidationError(
    `'systemRuntimeMinHostVersion' must be a dotted version string or false`
  );
}

function parseTest(entry: unknown, index: number, baseDir: string): TestRunConfig {
  const where = `tests[${index}]`;
  if (!isRecord(entry)) {
    throw new ConfigValidationError(`${where} must be an object`);
  }

  const builder = new TestRunConfigBuilder();
  const name = optionalString(entry, 'name', where);
  if (name) builder.testName(name);

  const resolve = (p: string) => path.resolve(baseDir, p);
  const sources = optionalStringArray(entry, 'sources', where);
  if (sources) builder.testSources(sources.map(resolve));

  builder.fullBitcode(optionalBoolean(entry, 'fullBitcode', where) ?? false);
  builder.codesign(optionalBoolean(entry, 'codesign', where) ?? true);

  const frameworks = entry.frameworks;
  let frameworkEntries: unknown[] = [];
  if (Array.isArray(frameworks)) {
    frameworkEntries = frameworks;
  } else if (frameworks !== undefined) {
    throw new ConfigValidationError(`${where}: 'frameworks' must be an array`);
  }
  frameworkEntries.forEach((framework, frameworkIndex) => {
    const frameworkWhere = `${where}.frameworks[${frameworkIndex}]`;
    if (!isRecord(framework)) {
      throw new ConfigValidationError(`${frameworkWhere} must be an object`);
    }
    builder.addFramework({
      name: optionalString(framework, 'name', frameworkWhere) ?? '',
      sources: optionalStringArray(framework, 'sources', frameworkWhere)?.map(resolve),
      bitcode: optionalBoolean(framework, 'bitcode', frameworkWhere),
      artifact: optionalString(framework, 'artifact', frameworkWhere),
      library: optionalString(framework, 'library', frameworkWhere),
      opts: optionalStringArray(framework, 'opts', frameworkWhere),
    });
  });

  return builder.build();
}

/**
 * Parse config text. Relative paths resolve against baseDir.
 */
export function parseHarnessConfig(
  text: string,
  baseDir: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configPath = path.join(baseDir, DEFAULT_CONFIG_FILE)
): LoadedConfig {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid YAML: ${message}`, configPath);
  }
  if (!isRecord(document)) {
    throw new ConfigValidationError('Config must be a YAML mapping', configPath);
  }

  try {
    const resolve = (p: string) => path.resolve(baseDir, p);

    const targetName =
      overrides.target ?? env.FWTEST_TARGET ?? optionalString(document, 'target', 'config');
    if (!targetName) {
      throw new ConfigValidationError(`'target' should be set`);
    }

    const outputRoot = overrides.outputRoot
      ? path.resolve(overrides.outputRoot)
      : env.FWTEST_OUTPUT_ROOT
        ? path.resolve(env.FWTEST_OUTPUT_ROOT)
        : resolve(optionalString(document, 'outputRoot', 'config') ?? DEFAULT_OUTPUT_ROOT);

    const settings: HarnessSettings = {
      outputRoot,
      target: parseTarget(targetName),
      harnessSource: resolve(
        optionalString(document, 'harnessSource', 'config') ?? DEFAULT_HARNESS_SOURCE
      ),
      codesignIdentity: optionalString(document, 'codesignIdentity', 'config') ?? '-',
      interpreterCandidates:
        optionalStringArray(document, 'interpreterCandidates', 'config') ??
        DEFAULT_INTERPRETER_CANDIDATES,
      systemRuntimePolicy: parseRuntimePolicy(document),
      simulatorDevice: optionalString(document, 'simulatorDevice', 'config'),
    };

    const toolchainFields = document.toolchain ?? {};
    if (!isRecord(toolchainFields)) {
      throw new ConfigValidationError(`'toolchain' must be an object`);
    }
    const toolchain: ToolchainOverrides = {};
    for (const key of ['developerDir', 'toolchainRoot', 'additionalToolsDir'] as const) {
      const value = optionalString(toolchainFields, key, 'toolchain');
      if (value) toolchain[key] = resolve(value);
    }

    const testsField = document.tests;
    if (!Array.isArray(testsField) || testsField.length === 0) {
      throw new ConfigValidationError(`'tests' must be a non-empty array`);
    }
    const testEntries: unknown[] = testsField;
    const tests = testEntries.map((entry, index) => parseTest(entry, index, baseDir));

    const seen = new Set<string>();
    for (const test of tests) {
      if (seen.has(test.testName)) {
        throw new ConfigValidationError(`Duplicate test name: ${test.testName}`);
      }
      seen.add(test.testName);
    }

    return { configPath, settings, toolchain, tests };
  } catch (error) {
    if (error instanceof ConfigValidationError && !error.file) {
      throw new ConfigValidationError(error.message, configPath);
    }
    throw error;
  }
}

export function loadHarnessConfig(
  configPath: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LoadedConfig {
  const absolutePath = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigValidationError('Config file not found', absolutePath);
    }
    throw error;
  }
  return parseHarnessConfig(text, path.dirname(absolutePath), overrides, env, absolutePath);
}

/**
 * Pick tests by name, keeping declaration order. No names selects all.
 */
export function selectTests(tests: readonly TestRunConfig[], names: readonly string[]): TestRunConfig[] {
  if (names.length === 0) return [...tests];
  const unknown = names.filter((name) => !tests.some((test) => test.testName === name));
  if (unknown.length > 0) {
    throw new ConfigValidationError(`Unknown test(s): ${unknown.join(', ')}`);
  }
  return tests.filter((test) => names.includes(test.testName));
}
