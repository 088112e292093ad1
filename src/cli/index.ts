#!/usr/bin/env node
// fwtest CLI
// Build and run Swift test executables against prebuilt frameworks

import { Command } from 'commander';
import { isLogLevel } from '../shared/logger-types';
import { logger } from '../main/utils/logger';
import { DEFAULT_CONFIG_FILE } from '../main/framework-test';
import { runTests } from './commands/run-tests';
import { listTests } from './commands/list-tests';
import { listTargets } from './commands/list-targets';
import { printStub } from './commands/print-stub';
import { formatError } from './output/formatter';

interface GlobalOptions {
  debug?: boolean;
  logFile?: string;
}

const program = new Command();

program
  .name('fwtest')
  .description('Build and run Swift test executables against prebuilt frameworks')
  .version('0.1.0')
  .option('--debug', 'Enable debug logging')
  .option('--log-file <path>', 'Also append logs to a file');

program.hook('preAction', () => {
  const { debug, logFile } = program.opts<GlobalOptions>();
  const envLevel = process.env.FWTEST_LOG_LEVEL;
  if (debug) {
    logger.setLogLevel('debug');
  } else if (envLevel && isLogLevel(envLevel)) {
    logger.setLogLevel(envLevel);
  }
  if (logFile) {
    logger.enableFileLogging(logFile);
  }
});

program
  .command('run')
  .description('Build and run tests (all declared tests when none are named)')
  .argument('[tests...]', 'Test names')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
  .option('-t, --target <target>', 'Target to build and run for')
  .option('-o, --output-root <dir>', 'Output root directory')
  .option('--json', 'Emit JSON Lines')
  .action(runTests);

program
  .command('list')
  .description('List declared tests')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
  .option('--json', 'Emit JSON Lines')
  .action(listTests);

program
  .command('targets')
  .description('List supported targets')
  .option('--json', 'Emit JSON Lines')
  .action(listTargets);

program
  .command('stub')
  .description('Print the provider stub generated for the given Swift sources')
  .argument('<sources...>', 'Swift files or directories')
  .action(printStub);

program.parseAsync().catch((error: unknown) => {
  console.error(formatError(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
