/**
 * Framework Test - Error Handling
 *
 * Error classes for every fatal condition of a test run, plus user-facing
 * messages with troubleshooting hints.
 */

import type { ProcessResult } from './types';

// =============================================================================
// Error Codes
// =============================================================================

export type HarnessErrorCode =
  | 'UNSUPPORTED_TARGET'
  | 'MISSING_INTERPRETER'
  | 'PROCESS_LAUNCH_FAILED'
  | 'EXTERNAL_TOOL_FAILED'
  | 'TEST_EXECUTION_FAILED'
  | 'CONFIG_INVALID'
  | 'FRAMEWORK_NOT_FOUND'
  | 'INVALID_STATE';

/**
 * User-friendly error messages with troubleshooting hints.
 */
export const ERROR_MESSAGES: Record<HarnessErrorCode, { title: string; hint: string }> = {
  UNSUPPORTED_TARGET: {
    title: 'Unsupported target',
    hint: 'Run `fwtest targets` to see the targets the harness can build for',
  },
  MISSING_INTERPRETER: {
    title: 'Interpreter not found',
    hint: 'Install python3 or list its location under interpreterCandidates in the config',
  },
  PROCESS_LAUNCH_FAILED: {
    title: 'Could not start process',
    hint: 'Check that the executable exists, is executable, and that the working directory exists',
  },
  EXTERNAL_TOOL_FAILED: {
    title: 'External tool failed',
    hint: 'Inspect the captured stdout/stderr above; the tool output usually names the cause',
  },
  TEST_EXECUTION_FAILED: {
    title: 'Test failed',
    hint: 'Check the test output for failed assertions or a crash in the test binary',
  },
  CONFIG_INVALID: {
    title: 'Invalid configuration',
    hint: 'Fix the named field in the config file or the builder call',
  },
  FRAMEWORK_NOT_FOUND: {
    title: 'Framework bundle not found',
    hint: 'Build the framework for the selected target before running the test',
  },
  INVALID_STATE: {
    title: 'Invalid test run state',
    hint: 'Build the test executable before running it',
  },
};

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for all harness errors.
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: HarnessErrorCode
  ) {
    super(message);
    this.name = 'HarnessError';
  }

  get hint(): string {
    return ERROR_MESSAGES[this.code].hint;
  }
}

export class UnsupportedTargetError extends HarnessError {
  constructor(public readonly target: string) {
    super(`Test target ${target} is not supported`, 'UNSUPPORTED_TARGET');
    this.name = 'UnsupportedTargetError';
  }
}

export class MissingInterpreterError extends HarnessError {
  constructor(public readonly candidates: readonly string[]) {
    super(`Can't find python3 (looked in: ${candidates.join(', ')})`, 'MISSING_INTERPRETER');
    this.name = 'MissingInterpreterError';
  }
}

export class ProcessLaunchError extends HarnessError {
  constructor(
    public readonly executable: string,
    public readonly reason: string
  ) {
    super(`Failed to launch ${executable}: ${reason}`, 'PROCESS_LAUNCH_FAILED');
    this.name = 'ProcessLaunchError';
  }
}

export type ExternalTool = 'compiler' | 'codesign' | 'bitcode-validator' | 'toolchain';

/**
 * Render captured process output the same way in every failure message.
 */
export function formatCapturedOutput(result: ProcessResult): string {
  return `exit code: ${result.exitCode}\nstdout: ${result.stdout}\nstderr: ${result.stderr}`;
}

export class ExternalToolFailure extends HarnessError {
  constructor(
    public readonly tool: ExternalTool,
    summary: string,
    public readonly result: ProcessResult,
    public readonly command?: string
  ) {
    super(`${summary}\n${formatCapturedOutput(result)}`, 'EXTERNAL_TOOL_FAILED');
    this.name = 'ExternalToolFailure';
  }
}

export class TestExecutionFailure extends HarnessError {
  constructor(
    public readonly executableName: string,
    public readonly result: ProcessResult
  ) {
    super(
      `Execution of ${executableName} failed with exit code: ${result.exitCode}\n${formatCapturedOutput(result)}`,
      'TEST_EXECUTION_FAILED'
    );
    this.name = 'TestExecutionFailure';
  }
}

export class ConfigValidationError extends HarnessError {
  constructor(
    message: string,
    public readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

export class FrameworkNotFoundError extends HarnessError {
  constructor(
    public readonly framework: string,
    public readonly bundleDir: string
  ) {
    super(`Framework ${framework} not found at ${bundleDir}`, 'FRAMEWORK_NOT_FOUND');
    this.name = 'FrameworkNotFoundError';
  }
}

export class InvalidStateError extends HarnessError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format any thrown value for display: title, message and a hint for harness errors.
 */
export function formatErrorForUser(error: unknown): string {
  if (error instanceof HarnessError) {
    const { title } = ERROR_MESSAGES[error.code];
    return `${title}: ${error.message}\n\nTip: ${error.hint}`;
  }
  if (error instanceof Error) {
    return `Unknown error: ${error.message}`;
  }
  return `Unknown error: ${String(error)}`;
}
