import type { Command } from 'commander';

import { registerBenchCommand } from '@/commands/bench.js';
import { registerStreamCommand } from '@/commands/stream.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands. Order sets the grouping in help output.
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Streaming:'),
  registerStreamCommand,

  addCommandGroup('Diagnostics:'),
  registerBenchCommand,
];
