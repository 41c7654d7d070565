/**
 * Library entry point.
 *
 * The CLI (`ingest`) is built on the same exports.
 */

export * from '@/pipeline/index.js';
export * from '@/queue/index.js';
export * from '@/metrics/index.js';
export * from '@/transport/index.js';
export {
  loadStreamConfig,
  type Environment,
  type StreamConfig,
  type StreamConfigOverrides,
} from '@/config.js';
export {
  buildRecord,
  runLoadTest,
  type LoadTestOptions,
  type LoadTestProgress,
  type LoadTestResult,
} from '@/harness/LoadHarness.js';
export type { StreamMessage, StreamMessageError } from '@/types.js';
export { ConfigError, StreamError, getErrorMessage, getExitCode } from '@/utils/errors.js';
export { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';
export { createLogger, enableDebugLogging, type Logger } from '@/ui/logging/index.js';
