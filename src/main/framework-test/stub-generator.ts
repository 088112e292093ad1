/**
 * Framework Test - Provider Stub Generator
 *
 * Emits the Swift source that the harness main routine calls to register
 * one test provider per test source file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export const PROVIDER_SUFFIX = 'Tests';

/**
 * "barTests.swift" -> "BarTests", "values.swift" -> "ValuesTests".
 */
export function providerNameFor(sourcePath: string): string {
  const baseName = path.basename(sourcePath, path.extname(sourcePath));
  const capitalized = baseName.charAt(0).toUpperCase() + baseName.slice(1);
  return capitalized.endsWith(PROVIDER_SUFFIX) ? capitalized : `${capitalized}${PROVIDER_SUFFIX}`;
}

export function generateProviderStub(testSources: readonly string[]): string {
  const calls = testSources.map((source) => `    ${providerNameFor(source)}()`);
  return [
    '// THIS IS AUTOGENERATED FILE',
    '// This method is invoked by the main routine to get a list of tests',
    'func registerProviders() {',
    ...calls,
    '}',
    '',
  ].join('\n');
}

/**
 * Overwrite `providerPath` with the stub for `testSources`.
 */
export async function writeProviderStub(
  providerPath: string,
  testSources: readonly string[]
): Promise<void> {
  await fs.mkdir(path.dirname(providerPath), { recursive: true });
  await fs.writeFile(providerPath, generateProviderStub(testSources), 'utf8');
}
