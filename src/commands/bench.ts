import type { Command } from 'commander';

import { integerOption, jsonOption } from '@/commands/shared/commonOptions.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  DEFAULT_BENCH_BURST,
  DEFAULT_BENCH_CAPACITY,
  DEFAULT_BENCH_DRAIN,
  DEFAULT_BENCH_MESSAGE_SIZE,
  DEFAULT_BENCH_MESSAGES,
} from '@/constants.js';
import { runLoadTest, type LoadTestResult } from '@/harness/LoadHarness.js';
import { formatLoadTestResult } from '@/ui/formatters/bench.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('bench');

/**
 * Options for the bench command.
 */
export interface BenchCommandOptions extends BaseCommandOptions {
  messages: number;
  capacity: number;
  burst: number;
  drain: number;
  size: number;
}

async function benchHandler(
  options: BenchCommandOptions
): Promise<{ success: true; data: LoadTestResult }> {
  let lastReported = 0;
  const result = await runLoadTest(
    {
      messageCount: options.messages,
      capacity: options.capacity,
      burstSize: options.burst,
      drainSize: options.drain,
      messageSize: options.size,
      onProgress: (progress) => {
        const percent = Math.floor((progress.sent / progress.total) * 10) * 10;
        if (percent > lastReported) {
          lastReported = percent;
          log.debug(
            `${percent}% sent (${progress.received} received, ${progress.dropped} dropped)`
          );
        }
      },
    },
    log
  );
  return { success: true, data: result };
}

/**
 * Register the bench command.
 */
export function registerBenchCommand(program: Command): void {
  program
    .command('bench')
    .description('Run a synthetic load test through the ingestion pipeline')
    .addOption(
      integerOption('--messages <n>', 'Records to generate', { min: 0 }).default(
        DEFAULT_BENCH_MESSAGES
      )
    )
    .addOption(
      integerOption('--capacity <n>', 'Ring buffer capacity', { min: 1 }).default(
        DEFAULT_BENCH_CAPACITY
      )
    )
    .addOption(
      integerOption('--burst <n>', 'Records per burst', { min: 1 }).default(DEFAULT_BENCH_BURST)
    )
    .addOption(
      integerOption('--drain <n>', 'Records consumed after each burst', { min: 1 }).default(
        DEFAULT_BENCH_DRAIN
      )
    )
    .addOption(
      integerOption('--size <bytes>', 'Approximate record size', { min: 1 }).default(
        DEFAULT_BENCH_MESSAGE_SIZE
      )
    )
    .addOption(jsonOption)
    .action(async (options: BenchCommandOptions) => {
      await runCommand(benchHandler, options, formatLoadTestResult);
    });
}
