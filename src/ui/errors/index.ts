/**
 * CLI error types.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
