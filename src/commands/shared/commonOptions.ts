import { Option } from 'commander';

import { integerParser, type IntegerRuleOptions } from '@/commands/shared/validation.js';

/**
 * Shared --json flag for machine-readable output.
 *
 * @example
 * ```typescript
 * program
 *   .command('bench')
 *   .addOption(jsonOption)
 *   .action((options) => {
 *     if (options.json) {
 *       console.log(JSON.stringify(result));
 *     }
 *   });
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Create an integer option validated by the shared integer parser.
 *
 * The field name used in error messages is the long flag without dashes.
 *
 * @example
 * ```typescript
 * program.addOption(integerOption('--limit <n>', 'Stop after N messages', { min: 1 }));
 * ```
 */
export function integerOption(
  flags: string,
  description: string,
  bounds: IntegerRuleOptions = {}
): Option {
  const option = new Option(flags, description);
  return option.argParser(integerParser(option.long?.replace(/^--/, '') ?? flags, bounds));
}
