// Run tests command
// Builds and runs the selected tests one after another

import {
  HarnessError,
  TestExecutionDriver,
  createHarness,
  formatErrorForUser,
  loadHarnessConfig,
  selectTests,
} from '../../main/framework-test';
import { logger } from '../../main/utils/logger';
import { emitError, emitSummary, emitTestResult, emitTestStart } from '../output/jsonl';
import { formatError, formatOutcome, formatSummary, formatTestStart } from '../output/formatter';

export interface RunTestsOptions {
  config: string;
  target?: string;
  outputRoot?: string;
  json?: boolean;
}

export async function runTests(testNames: string[], options: RunTestsOptions): Promise<void> {
  const useJson = options.json;
  if (useJson) {
    logger.setConsoleOutput(false);
  }

  let passed = 0;
  let failed = 0;
  let errors = 0;

  try {
    const loaded = loadHarnessConfig(options.config, {
      target: options.target,
      outputRoot: options.outputRoot,
    });
    const tests = selectTests(loaded.tests, testNames);
    const harness = createHarness(loaded.settings, { toolchainOverrides: loaded.toolchain });

    // Sequential: runs share the toolchain and must not race on output paths
    for (const test of tests) {
      if (useJson) {
        emitTestStart(test.testName, loaded.settings.target);
      } else {
        console.log(formatTestStart(test.testName, loaded.settings.target));
      }

      try {
        const outcome = await new TestExecutionDriver(test, harness).execute();
        if (outcome.state === 'Passed') passed++;
        else failed++;

        if (useJson) {
          emitTestResult(outcome);
        } else {
          console.log(formatOutcome(outcome));
        }
      } catch (error) {
        if (!(error instanceof HarnessError)) throw error;
        errors++;
        if (useJson) {
          emitError(`${test.testName}: ${error.message}`, error.code);
        } else {
          console.error(formatError(`${test.testName}: ${formatErrorForUser(error)}`));
        }
      }
    }
  } catch (error) {
    const message = formatErrorForUser(error);
    if (useJson) {
      emitError(message, error instanceof HarnessError ? error.code : 'UNKNOWN');
    } else {
      console.error(formatError(message));
    }
    process.exitCode = 1;
    return;
  }

  if (useJson) {
    emitSummary(passed, failed, errors);
  } else {
    console.log(formatSummary(passed, failed, errors));
  }
  if (failed > 0 || errors > 0) {
    process.exitCode = 1;
  }
}
