/**
 * Stream configuration.
 *
 * Defaults come from constants.ts. Environment variables override the
 * defaults and explicit overrides (CLI flags) win over both.
 */

import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_KEEPALIVE_INTERVAL_MS,
  DEFAULT_MAX_BUFFER_BYTES,
  DEFAULT_MAX_PENDING,
  DEFAULT_PROCESSING_RATE_MS,
} from '@/constants.js';
import { ConfigError } from '@/utils/errors.js';

/**
 * Numeric settings shared by both transports.
 */
export interface StreamConfig {
  /** Line buffer limit in bytes */
  maxBufferBytes: number;
  /** Queue capacity */
  maxPending: number;
  /** Minimum milliseconds between consumer dequeues */
  processingRateMs: number;
  /** Handshake window in milliseconds */
  connectTimeoutMs: number;
  /** Socket ping interval in milliseconds (0 disables keepalive) */
  keepaliveIntervalMs: number;
}

export type StreamConfigOverrides = { [K in keyof StreamConfig]?: StreamConfig[K] | undefined };

export type Environment = Record<string, string | undefined>;

interface SettingSpec {
  env: string;
  min: number;
  fallback: number;
}

const SETTINGS: Record<keyof StreamConfig, SettingSpec> = {
  maxBufferBytes: { env: 'INGEST_MAX_BUFFER_BYTES', min: 1, fallback: DEFAULT_MAX_BUFFER_BYTES },
  maxPending: { env: 'INGEST_MAX_PENDING', min: 1, fallback: DEFAULT_MAX_PENDING },
  processingRateMs: {
    env: 'INGEST_PROCESSING_RATE_MS',
    min: 0,
    fallback: DEFAULT_PROCESSING_RATE_MS,
  },
  connectTimeoutMs: {
    env: 'INGEST_CONNECT_TIMEOUT_MS',
    min: 1,
    fallback: DEFAULT_CONNECT_TIMEOUT_MS,
  },
  keepaliveIntervalMs: {
    env: 'INGEST_KEEPALIVE_INTERVAL_MS',
    min: 0,
    fallback: DEFAULT_KEEPALIVE_INTERVAL_MS,
  },
};

const INVALID_ENV_ERROR = (name: string, value: string, min: number): string =>
  `Invalid ${name}: "${value}" (expected an integer >= ${min})`;
const INVALID_OVERRIDE_ERROR = (key: string, value: number, min: number): string =>
  `Invalid ${key}: ${value} (expected an integer >= ${min})`;

function parseEnvInteger(name: string, raw: string, min: number): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(INVALID_ENV_ERROR(name, raw, min));
  }
  const value = parseInt(trimmed, 10);
  if (value < min) {
    throw new ConfigError(INVALID_ENV_ERROR(name, raw, min));
  }
  return value;
}

function resolveSetting(
  key: keyof StreamConfig,
  env: Environment,
  overrides: StreamConfigOverrides
): number {
  const spec = SETTINGS[key];
  const override = overrides[key];

  if (override !== undefined) {
    if (!Number.isInteger(override) || override < spec.min) {
      throw new ConfigError(INVALID_OVERRIDE_ERROR(key, override, spec.min));
    }
    return override;
  }

  const raw = env[spec.env];
  if (raw !== undefined && raw.trim() !== '') {
    return parseEnvInteger(spec.env, raw, spec.min);
  }

  return spec.fallback;
}

/**
 * Resolve the stream configuration.
 *
 * @throws ConfigError for a malformed or out-of-range value
 *
 * @example
 * ```typescript
 * loadStreamConfig({ INGEST_MAX_PENDING: '50' }, { processingRateMs: 0 });
 * // { maxPending: 50, processingRateMs: 0, ...defaults }
 * ```
 */
export function loadStreamConfig(
  env: Environment = process.env,
  overrides: StreamConfigOverrides = {}
): StreamConfig {
  return {
    maxBufferBytes: resolveSetting('maxBufferBytes', env, overrides),
    maxPending: resolveSetting('maxPending', env, overrides),
    processingRateMs: resolveSetting('processingRateMs', env, overrides),
    connectTimeoutMs: resolveSetting('connectTimeoutMs', env, overrides),
    keepaliveIntervalMs: resolveSetting('keepaliveIntervalMs', env, overrides),
  };
}
