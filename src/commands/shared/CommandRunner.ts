import { CommandError } from '@/ui/errors/index.js';
import { genericError, unknownError } from '@/ui/messages/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { getErrorMessage, getExitCode } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  /** Printed to stdout; commands that stream their own output leave it out */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Exit code override for a failed result */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output of the result data.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Print an error the way every command does and return its exit code.
 *
 * CommandError metadata is printed under the message; any error carrying
 * an `exitCode` (the stream errors) keeps it.
 */
export function reportCommandError(error: unknown, json: boolean): number {
  if (error instanceof CommandError) {
    if (json) {
      console.log(
        JSON.stringify(
          OutputBuilder.buildJsonError(error.message, {
            exitCode: error.exitCode,
            ...error.metadata,
          }),
          null,
          2
        )
      );
    } else {
      console.error(genericError(error.message));
      for (const value of Object.values(error.metadata)) {
        console.error(value);
      }
    }
    return error.exitCode;
  }

  const exitCode = getExitCode(error);
  if (json) {
    console.log(
      JSON.stringify(OutputBuilder.buildJsonError(getErrorMessage(error), { exitCode }), null, 2)
    );
  } else {
    console.error(genericError(getErrorMessage(error)));
  }
  return exitCode;
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => ({ success: true, data: await runLoadTest(opts) }),
 *   options,
 *   formatLoadTestResult
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  const json = options.json ?? false;

  try {
    const result = await handler(options);

    if (!result.success) {
      if (json) {
        console.log(
          JSON.stringify(OutputBuilder.buildJsonError(result.error ?? 'Unknown error'), null, 2)
        );
      } else {
        console.error(result.error ? genericError(result.error) : unknownError());
      }
      process.exit(result.exitCode ?? EXIT_CODES.GENERIC_FAILURE);
    }

    if (result.data !== undefined) {
      if (json) {
        console.log(JSON.stringify(OutputBuilder.buildJsonSuccess(result.data), null, 2));
      } else if (formatter) {
        console.log(formatter(result.data));
      } else {
        console.log(JSON.stringify(result.data, null, 2));
      }
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    process.exit(reportCommandError(error, json));
  }
}
