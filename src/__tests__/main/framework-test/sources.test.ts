/**
 * Tests for src/main/framework-test/sources.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { collectSources, Language } from '../../../main/framework-test/sources';
import { ConfigValidationError } from '../../../main/framework-test/errors';
import { cleanupTestDir, createTestDir } from './fakes';

describe('collectSources', () => {
  let dir: string;

  const touch = (...segments: string[]) => {
    const file = path.join(dir, ...segments);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '');
    return file;
  };

  beforeEach(() => {
    dir = createTestDir();
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('keeps declared files in order', async () => {
    const b = touch('b.swift');
    const a = touch('a.swift');

    await expect(collectSources([b, a], Language.Swift)).resolves.toEqual([b, a]);
  });

  it('walks directories recursively in sorted order, keeping one language', async () => {
    const nested = touch('suite', 'nested', 'c.swift');
    const first = touch('suite', 'a.swift');
    touch('suite', 'b.kt');
    touch('suite', 'README.md');

    await expect(collectSources([path.join(dir, 'suite')], Language.Swift)).resolves.toEqual([
      first,
      nested,
    ]);
  });

  it('rejects missing entries', async () => {
    const missing = path.join(dir, 'missing.swift');

    const error = await collectSources([missing], Language.Swift).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ message: `Source not found: ${missing}` });
  });
});
