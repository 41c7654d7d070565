/**
 * JSON envelopes for command results printed with --json.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * @example
   * ```typescript
   * OutputBuilder.buildJsonError('Connection refused', { exitCode: 101 });
   * // { version: '0.3.0', success: false, error: 'Connection refused', exitCode: 101 }
   * ```
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  static buildJsonSuccess(data: unknown): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      data,
    };
  }
}
