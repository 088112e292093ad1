// Print stub command
// Shows the provider stub that would be generated for the given sources

import { collectSources, generateProviderStub, formatErrorForUser, Language } from '../../main/framework-test';
import { formatError } from '../output/formatter';

export async function printStub(sources: string[]): Promise<void> {
  try {
    const files = await collectSources(sources, Language.Swift);
    process.stdout.write(generateProviderStub(files));
  } catch (error) {
    console.error(formatError(formatErrorForUser(error)));
    process.exitCode = 1;
  }
}
