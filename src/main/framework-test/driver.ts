/**
 * Framework Test - Test Execution Driver
 *
 * Drives one test through NotBuilt -> Built -> Ran -> Passed | Failed.
 * A failing test binary is a reported outcome; every other failure throws.
 */

import * as path from 'path';
import { logger } from '../utils/logger';
import { buildTestEnvironment } from './environment';
import { InvalidStateError, TestExecutionFailure } from './errors';
import type { Harness } from './harness';
import { describeTarget } from './targets';
import type { TestOutcome, TestRunConfig, TestRunState } from './types';

const LOG_CONTEXT = '[FrameworkTest-Driver]';

export class TestExecutionDriver {
  private currentState: TestRunState = 'NotBuilt';
  private executablePath: string | null = null;

  constructor(
    private readonly config: TestRunConfig,
    private readonly harness: Harness
  ) {}

  get state(): TestRunState {
    return this.currentState;
  }

  get testName(): string {
    return this.config.testName;
  }

  async build(): Promise<string> {
    if (this.currentState !== 'NotBuilt') {
      throw new InvalidStateError(`Test ${this.config.testName} is already built (state: ${this.currentState})`);
    }
    this.executablePath = await this.harness.builder.build(this.config);
    this.currentState = 'Built';
    return this.executablePath;
  }

  async run(): Promise<TestOutcome> {
    if (this.currentState !== 'Built' || this.executablePath === null) {
      throw new InvalidStateError(
        `Test ${this.config.testName} must be built before it runs (state: ${this.currentState})`
      );
    }
    const executablePath = this.executablePath;
    const { settings, resolver, toolchain, runner, env } = this.harness;

    const delta = await buildTestEnvironment(
      settings.target,
      resolver,
      toolchain,
      settings.systemRuntimePolicy
    );

    let executable = executablePath;
    let args: string[] = [];
    if (settings.simulatorDevice && describeTarget(settings.target).simulator) {
      executable = 'xcrun';
      args = ['simctl', 'spawn', settings.simulatorDevice, executablePath];
    }

    const startedAt = Date.now();
    const result = await runner.run(executable, args, settings.outputRoot, { ...env, ...delta });
    this.currentState = 'Ran';

    const executableName = path.basename(executablePath);
    logger.info(
      `${LOG_CONTEXT} ${executableName}\nstdout: ${result.stdout}\nstderr: ${result.stderr}`,
      LOG_CONTEXT
    );

    const outcome: TestOutcome = {
      testName: this.config.testName,
      state: result.exitCode === 0 ? 'Passed' : 'Failed',
      executablePath,
      result,
      environment: delta,
      durationMs: Date.now() - startedAt,
    };
    if (outcome.state === 'Failed') {
      outcome.failure = new TestExecutionFailure(executableName, result);
      logger.error(`${LOG_CONTEXT} ${outcome.failure.message}`, LOG_CONTEXT);
    }

    this.currentState = outcome.state;
    return outcome;
  }

  /**
   * Build, then run.
   */
  async execute(): Promise<TestOutcome> {
    await this.build();
    return this.run();
  }
}
