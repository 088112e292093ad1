/**
 * Framework Test - Utility Functions
 *
 * Version comparison and JSON parsing for toolchain output.
 */

/**
 * Compare dotted version strings numerically, component by component.
 * Missing components count as zero, so "10.14" equals "10.14.0".
 *
 * @returns negative if a < b, zero if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
  const left = a.trim().split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.trim().split('.').map((part) => parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Parse JSON that may be preceded by non-JSON noise (xcrun warnings and the like).
 *
 * @throws SyntaxError when no JSON value can be found
 */
export function parseJson(output: string): unknown {
  const objectStart = output.indexOf('{');
  const arrayStart = output.indexOf('[');

  let startIndex: number;
  if (objectStart === -1 && arrayStart === -1) {
    throw new SyntaxError('No JSON found in output');
  } else if (objectStart === -1) {
    startIndex = arrayStart;
  } else if (arrayStart === -1) {
    startIndex = objectStart;
  } else {
    startIndex = Math.min(objectStart, arrayStart);
  }

  return JSON.parse(output.slice(startIndex));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
