/**
 * Validation error messages for command options and arguments.
 */

import { joinLines } from '@/ui/formatting.js';

export interface IntegerValidationOptions {
  min?: number;
  max?: number;
  /** Example valid value to show */
  exampleValue?: number;
}

/**
 * @example
 * ```typescript
 * invalidIntegerError('max-pending', 'abc', { min: 1 });
 * // Invalid max-pending: "abc" is not a valid integer
 * // Must be at least 1
 * //
 * // Example: --max-pending 1
 * ```
 */
export function invalidIntegerError(
  fieldName: string,
  value: string,
  options?: IntegerValidationOptions
): string {
  const header = `Invalid ${fieldName}: "${value}" is not a valid integer`;

  let rangeInfo: string | undefined;
  if (options?.min !== undefined && options?.max !== undefined) {
    rangeInfo = `Valid range: ${options.min} to ${options.max}`;
  } else if (options?.min !== undefined) {
    rangeInfo = `Must be at least ${options.min}`;
  } else if (options?.max !== undefined) {
    rangeInfo = `Must be at most ${options.max}`;
  }

  const example = options?.exampleValue ?? options?.min ?? 1;

  return joinLines(header, rangeInfo, '', `Example: --${fieldName} ${example}`);
}

export function invalidJsonOptionError(fieldName: string, reason: string): string {
  return `--${fieldName} must be valid JSON (${reason})`;
}

export function invalidEndpointMessage(endpoint: string): string {
  return `"${endpoint}" is not an http(s) or ws(s) URL`;
}
