/**
 * Centralized configuration constants.
 *
 * Timing, limit and threshold values used throughout the ingestion core.
 * Runtime overrides go through `loadStreamConfig()` in config.ts.
 */

// ============================================================================
// LINE BUFFERING & DECODING
// ============================================================================

/**
 * Maximum bytes held for an unterminated record (1 MiB)
 */
export const DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024;

/**
 * Maximum size of a single JSONL record accepted by the decoder (1 MiB)
 */
export const DEFAULT_MAX_MESSAGE_BYTES = 1024 * 1024;

/**
 * Text encoding for wire data
 */
export const UTF8_ENCODING = 'utf8' as const;

// ============================================================================
// BACKPRESSURE
// ============================================================================

/**
 * Maximum number of decoded messages waiting for the consumer
 */
export const DEFAULT_MAX_PENDING = 1000;

/**
 * Minimum interval between two dequeues in milliseconds
 */
export const DEFAULT_PROCESSING_RATE_MS = 1;

// ============================================================================
// TRANSPORT
// ============================================================================

/**
 * Time allowed for a transport handshake before the connect attempt fails
 */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/**
 * WebSocket ping interval while connected
 */
export const DEFAULT_KEEPALIVE_INTERVAL_MS = 30000;

/**
 * Unanswered pings tolerated before the socket is considered dead
 */
export const DEFAULT_MAX_MISSED_PONGS = 3;

/**
 * WebSocket close codes
 */
export const WEBSOCKET_NORMAL_CLOSURE = 1000;
export const WEBSOCKET_GOING_AWAY = 1001;

/**
 * Event-stream media type
 */
export const EVENT_STREAM_CONTENT_TYPE = 'text/event-stream';

// ============================================================================
// RECONNECTION
// ============================================================================

/**
 * Reconnect attempts made by the supervisor before giving up
 */
export const DEFAULT_RECONNECT_ATTEMPTS = 5;

/**
 * First backoff delay; doubles on every failed attempt
 */
export const DEFAULT_BASE_RETRY_DELAY_MS = 1000;

/**
 * Upper bound on the backoff delay
 */
export const DEFAULT_MAX_RETRY_DELAY_MS = 10000;

// ============================================================================
// METRICS
// ============================================================================

/**
 * Sampling period of the metrics collector
 */
export const DEFAULT_METRICS_INTERVAL_MS = 500;

/**
 * Number of most recent latency samples averaged into meanLatencyMs
 */
export const DEFAULT_LATENCY_WINDOW = 100;

/**
 * Trailing window used to compute messages per second
 */
export const DEFAULT_THROUGHPUT_WINDOW_MS = 1000;

/**
 * Number of snapshots retained in the collector history
 */
export const DEFAULT_METRICS_HISTORY = 120;

/**
 * Relative change that turns a trend from 'stable' into 'up' or 'down'
 */
export const TREND_THRESHOLD = 0.05;

/**
 * Health thresholds
 */
export const QUEUE_FILL_WARNING = 0.7;
export const QUEUE_FILL_CRITICAL = 0.9;
export const DECODE_SUCCESS_WARNING = 0.99;
export const DECODE_SUCCESS_CRITICAL = 0.95;
export const MIN_CONSUMER_THROUGHPUT = 10;

// ============================================================================
// LOAD HARNESS
// ============================================================================

export const DEFAULT_BENCH_MESSAGES = 10000;
export const DEFAULT_BENCH_CAPACITY = 1000;
export const DEFAULT_BENCH_BURST = 100;
export const DEFAULT_BENCH_DRAIN = 80;
export const DEFAULT_BENCH_MESSAGE_SIZE = 256;
