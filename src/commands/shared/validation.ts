/**
 * Validation for command options and arguments.
 *
 * Every parser throws CommandError with INVALID_ARGUMENTS (or INVALID_URL
 * for endpoints) so the runner can map it to an exit code.
 */

import type { OverflowPolicy } from '@/pipeline/types.js';
import type { TransportSelection } from '@/transport/createTransport.js';
import type { SheddingPolicy } from '@/transport/types.js';
import { CommandError } from '@/ui/errors/index.js';
import {
  invalidEndpointMessage,
  invalidIntegerError,
  invalidJsonOptionError,
  type IntegerValidationOptions,
} from '@/ui/messages/validation.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { detectTransportKind } from '@/utils/url.js';

/**
 * Bounds for an integer option
 */
export interface IntegerRuleOptions {
  min?: number;
  max?: number;
}

const TRANSPORT_ALIASES: Record<string, TransportSelection> = {
  auto: 'auto',
  sse: 'event-stream',
  'event-stream': 'event-stream',
  ws: 'socket',
  socket: 'socket',
};

/**
 * Parse a whole number within bounds.
 *
 * @example
 * ```typescript
 * parseInteger('max-pending', '500', { min: 1 }) // 500
 * parseInteger('max-pending', '0', { min: 1 })   // throws CommandError
 * ```
 */
export function parseInteger(
  fieldName: string,
  raw: string,
  options: IntegerRuleOptions = {}
): number {
  const { min, max } = options;
  const value = raw.trim();

  // Build message options conditionally to satisfy exactOptionalPropertyTypes
  const messageOptions: IntegerValidationOptions = {};
  if (min !== undefined) messageOptions.min = min;
  if (max !== undefined) messageOptions.max = max;

  if (!/^-?\d+$/.test(value)) {
    throw new CommandError(
      invalidIntegerError(fieldName, value, messageOptions),
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }

  const parsed = parseInt(value, 10);
  if ((min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
    throw new CommandError(
      invalidIntegerError(fieldName, value, messageOptions),
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }

  return parsed;
}

/**
 * Commander argParser for an integer option.
 *
 * @example
 * ```typescript
 * new Option('--limit <n>').argParser(integerParser('limit', { min: 1 }));
 * ```
 */
export function integerParser(
  fieldName: string,
  options: IntegerRuleOptions = {}
): (value: string) => number {
  return (value: string) => parseInteger(fieldName, value, options);
}

/**
 * Parse a JSON option value such as `--send '{"method":"subscribe"}'`.
 */
export function parseJsonValue(fieldName: string, raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new CommandError(
      invalidJsonOptionError(fieldName, getErrorMessage(error)),
      { suggestion: `Quote the value: --${fieldName} '{"method":"subscribe"}'` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
}

/**
 * Accept `auto`, `sse` / `event-stream` or `ws` / `socket`.
 */
export function parseTransportSelection(raw: string): TransportSelection {
  const selection = TRANSPORT_ALIASES[raw.trim().toLowerCase()];
  if (!selection) {
    throw new CommandError(
      `Unknown transport "${raw}"`,
      { suggestion: 'Use --transport sse, --transport ws or --transport auto' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return selection;
}

export function parseOverflowPolicy(raw: string): OverflowPolicy {
  if (raw === 'reset' || raw === 'fail') {
    return raw;
  }
  throw new CommandError(
    `Unknown overflow policy "${raw}"`,
    { suggestion: 'Use --overflow reset or --overflow fail' },
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

export function parseSheddingPolicy(raw: string): SheddingPolicy {
  if (raw === 'drop' || raw === 'fail') {
    return raw;
  }
  throw new CommandError(
    `Unknown shedding policy "${raw}"`,
    { suggestion: 'Use --shed drop or --shed fail' },
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

/**
 * Require an http(s) or ws(s) endpoint.
 */
export function validateEndpoint(raw: string): string {
  const endpoint = raw.trim();
  try {
    detectTransportKind(endpoint);
  } catch (error) {
    throw new CommandError(
      invalidEndpointMessage(endpoint),
      { note: getErrorMessage(error) },
      EXIT_CODES.INVALID_URL
    );
  }
  return endpoint;
}
