// Human-readable output formatting for the CLI

import type { TargetDescriptor, TestOutcome, TestRunConfig } from '../../main/framework-test';

const useColor = process.stdout.isTTY === true && !process.env.NO_COLOR;

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

function paint(color: keyof typeof colors, text: string): string {
  return useColor ? `${colors[color]}${text}${colors.reset}` : text;
}

export function formatError(message: string): string {
  return `${paint('red', '✗')} ${message}`;
}

export function formatTestStart(testName: string, target: string): string {
  return `${paint('bold', testName)} ${paint('dim', `(${target})`)}`;
}

export function formatOutcome(outcome: TestOutcome): string {
  const seconds = (outcome.durationMs / 1000).toFixed(1);
  if (outcome.state === 'Passed') {
    return `${paint('green', '✓')} ${outcome.testName} passed ${paint('dim', `in ${seconds}s`)}`;
  }
  const lines = [
    `${paint('red', '✗')} ${outcome.testName} failed with exit code ${outcome.result.exitCode}`,
  ];
  if (outcome.result.stdout) lines.push(paint('dim', 'stdout:'), outcome.result.stdout.trimEnd());
  if (outcome.result.stderr) lines.push(paint('dim', 'stderr:'), outcome.result.stderr.trimEnd());
  return lines.join('\n');
}

export function formatSummary(passed: number, failed: number, errors: number): string {
  const parts = [paint('green', `${passed} passed`)];
  if (failed > 0) parts.push(paint('red', `${failed} failed`));
  if (errors > 0) parts.push(paint('yellow', `${errors} errored`));
  return parts.join(', ');
}

export function formatTest(test: TestRunConfig): string {
  const frameworks = test.frameworks.map((framework) =>
    framework.artifact === framework.name ? framework.name : `${framework.name} -> ${framework.artifact}`
  );
  const flags = [test.fullBitcode ? 'full bitcode' : null, test.codesign ? 'codesign' : null]
    .filter((flag): flag is string => flag !== null)
    .join(', ');
  return [
    `${paint('bold', test.testName)}${flags ? paint('dim', ` [${flags}]`) : ''}`,
    `  sources:    ${test.testSources.join(', ')}`,
    `  frameworks: ${frameworks.join(', ')}`,
  ].join('\n');
}

export function formatTarget(descriptor: TargetDescriptor): string {
  const kind = descriptor.simulator ? 'simulator' : descriptor.family === 'macos' ? 'desktop' : 'device';
  return `${descriptor.target.padEnd(14)} ${descriptor.family.padEnd(8)} ${descriptor.architecture.padEnd(9)} ${kind.padEnd(10)} ${descriptor.sdkName} ${descriptor.osVersionMin}`;
}
