/**
 * Framework Test - Source Collection
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigValidationError } from './errors';

export enum Language {
  Swift = '.swift',
}

async function walk(dir: string, extension: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(fullPath, extension)));
    } else if (entry.name.endsWith(extension)) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Expand declared source entries into files of one language. Files are kept
 * as declared; directories contribute their matching files in sorted order.
 * Declaration order is preserved across entries.
 */
export async function collectSources(
  entries: readonly string[],
  language: Language
): Promise<string[]> {
  const files: string[] = [];
  for (const entry of entries) {
    const stat = await fs.stat(entry).catch(() => {
      throw new ConfigValidationError(`Source not found: ${entry}`);
    });
    if (stat.isDirectory()) {
      files.push(...(await walk(entry, language)));
    } else {
      files.push(entry);
    }
  }
  return files;
}
