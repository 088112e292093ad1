/**
 * @file list-targets.test.ts
 * @description Tests for the targets CLI command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { listTargets } from '../../../cli/commands/list-targets';

describe('targets command', () => {
	let stdoutSpy: MockInstance;
	let consoleSpy: MockInstance;

	beforeEach(() => {
		stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
		consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
	});

	afterEach(() => {
		stdoutSpy.mockRestore();
		consoleSpy.mockRestore();
	});

	it('emits one JSON line per target', () => {
		listTargets({ json: true });

		const events = stdoutSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
		expect(events).toHaveLength(10);
		expect(events[0]).toMatchObject({
			type: 'target',
			target: 'ios_x64',
			family: 'ios',
			architecture: 'x86_64',
			simulator: true,
			sdkName: 'iphonesimulator',
			osVersionMin: '9.0',
		});
	});

	it('prints a table row per target', () => {
		listTargets({});

		expect(consoleSpy).toHaveBeenCalledTimes(10);
		expect(String(consoleSpy.mock.calls[5][0])).toBe(
			'macos_x64      macos    x86_64    desktop    macosx 10.11'
		);
	});
});
