// List tests command
// Lists the tests declared in the config file

import { formatErrorForUser, HarnessError, loadHarnessConfig } from '../../main/framework-test';
import { emitError, emitTest } from '../output/jsonl';
import { formatError, formatTest } from '../output/formatter';

export interface ListTestsOptions {
  config: string;
  json?: boolean;
}

export function listTests(options: ListTestsOptions): void {
  try {
    const { tests } = loadHarnessConfig(options.config);

    for (const test of tests) {
      if (options.json) {
        emitTest({
          name: test.testName,
          sources: test.testSources,
          frameworks: test.frameworks.map((framework) => framework.name),
          fullBitcode: test.fullBitcode,
          codesign: test.codesign,
        });
      } else {
        console.log(formatTest(test));
      }
    }
  } catch (error) {
    if (options.json) {
      emitError(formatErrorForUser(error), error instanceof HarnessError ? error.code : 'UNKNOWN');
    } else {
      console.error(formatError(formatErrorForUser(error)));
    }
    process.exitCode = 1;
  }
}
