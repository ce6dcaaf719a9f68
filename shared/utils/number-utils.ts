/**
 * Number Utility Functions
 *
 * Strict numeric parsing and rounding shared by the cleaning pipeline,
 * the audit store and the HTTP layer.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer, rejecting anything that is not one.
 *
 * Unlike `parseInt`, partial matches are not accepted: `"1.5"`, `"12abc"`,
 * `"1e3"` and the empty string all return null instead of being truncated.
 *
 * @example
 * ```typescript
 * parseStrictInteger(' 42 '); // 42
 * parseStrictInteger('-5');   // -5
 * parseStrictInteger('1.5');  // null
 * ```
 */
export function parseStrictInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    return null;
  }
  // "-0" is zero
  return parsed === 0 ? 0 : parsed;
}

/**
 * Round to a fixed number of decimal places (half away from zero for the
 * positive values this project deals with).
 */
export function roundTo(value: number, digits: number = 2): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}
