#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { reportCommandError } from '@/commands/shared/CommandRunner.js';
import { enableDebugLogging } from '@/ui/logging/index.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'ingest';
const CLI_DESCRIPTION = 'JSONL stream ingestion over Server-Sent Events or WebSocket';

/**
 * Main entry point.
 *
 * Option parsers throw CommandError for bad input; those surface here with
 * their exit code. Command actions handle their own errors and exit.
 */
async function main(): Promise<void> {
  // Check for --debug early so option parsing is traced too
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  process.exit(reportCommandError(error, process.argv.includes('--json')));
});
