// JSON Lines output for the CLI
// One JSON object per line on stdout, for scripts and CI

import type { TargetDescriptor, TestOutcome } from '../../main/framework-test';

export interface JsonlEvent {
  type: string;
  timestamp: number;
  [key: string]: unknown;
}

export function emitJsonl(event: Omit<JsonlEvent, 'timestamp'>): void {
  process.stdout.write(`${JSON.stringify({ ...event, timestamp: Date.now() })}\n`);
}

export function emitError(message: string, code: string): void {
  emitJsonl({ type: 'error', message, code });
}

export function emitTestStart(testName: string, target: string): void {
  emitJsonl({ type: 'test_start', testName, target });
}

export function emitTestResult(outcome: TestOutcome): void {
  emitJsonl({
    type: 'test_result',
    testName: outcome.testName,
    state: outcome.state,
    exitCode: outcome.result.exitCode,
    executablePath: outcome.executablePath,
    environment: outcome.environment,
    durationMs: outcome.durationMs,
    stdout: outcome.result.stdout,
    stderr: outcome.result.stderr,
  });
}

export function emitTest(test: {
  name: string;
  sources: readonly string[];
  frameworks: readonly string[];
  fullBitcode: boolean;
  codesign: boolean;
}): void {
  emitJsonl({ type: 'test', ...test });
}

export function emitTarget(descriptor: TargetDescriptor): void {
  emitJsonl({ type: 'target', ...descriptor });
}

export function emitSummary(passed: number, failed: number, errors: number): void {
  emitJsonl({ type: 'summary', passed, failed, errors });
}
