import type { Command } from 'commander';
import { Option } from 'commander';

import { integerOption, jsonOption } from '@/commands/shared/commonOptions.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  parseJsonValue,
  parseOverflowPolicy,
  parseSheddingPolicy,
  parseTransportSelection,
  validateEndpoint,
} from '@/commands/shared/validation.js';
import { loadStreamConfig } from '@/config.js';
import { DEFAULT_METRICS_INTERVAL_MS, DEFAULT_RECONNECT_ATTEMPTS } from '@/constants.js';
import type { HealthLevel } from '@/metrics/health.js';
import {
  StreamMetricsCollector,
  type MetricsSnapshot,
} from '@/metrics/StreamMetricsCollector.js';
import { isStreamMessage } from '@/pipeline/schema.js';
import type { OverflowPolicy } from '@/pipeline/types.js';
import { createTransport, type TransportSelection } from '@/transport/createTransport.js';
import { StreamConnectionError, StreamTimeoutError } from '@/transport/errors.js';
import { StreamSupervisor, type SupervisorStatus } from '@/transport/StreamSupervisor.js';
import type { SheddingPolicy, TransportDiagnostic } from '@/transport/types.js';
import type { StreamMessage } from '@/types.js';
import { CommandError } from '@/ui/errors/index.js';
import { formatMetricsLine, formatMetricsSummary } from '@/ui/formatters/metrics.js';
import { createLogger } from '@/ui/logging/index.js';
import { connectionFailedSuggestion, reconnectExhaustedError } from '@/ui/messages/errors.js';
import {
  connectedMessage,
  connectingMessage,
  dataQualityWarning,
  decodeFailureMessage,
  interruptedMessage,
  overflowMessage,
  retryingMessage,
  streamEndedMessage,
} from '@/ui/messages/stream.js';

const log = createLogger('ingest');

/**
 * Options for the stream command.
 */
export interface StreamCommandOptions extends BaseCommandOptions {
  transport: TransportSelection;
  maxPending?: number;
  rate?: number;
  maxBuffer?: number;
  overflow: OverflowPolicy;
  shed: SheddingPolicy;
  connectTimeout?: number;
  keepalive?: number;
  retries: number;
  send?: unknown;
  limit?: number;
  metrics: boolean;
}

/**
 * Summary printed to stderr when the stream ends.
 */
export interface StreamSummary {
  endpoint: string;
  received: number;
  metrics: MetricsSnapshot;
}

function reportDiagnostic(diagnostic: TransportDiagnostic): void {
  switch (diagnostic.kind) {
    case 'decode_failure':
      log.debug(decodeFailureMessage(diagnostic.diagnostic));
      break;
    case 'buffer_overflow':
      log.info(overflowMessage(diagnostic.discardedBytes, diagnostic.limit));
      break;
    case 'dropped':
      log.debug(`Dropped message #${diagnostic.sequence} (queue ${diagnostic.queueSize})`);
      break;
  }
}

/**
 * Warn once each time decoder health gets worse.
 */
function createQualityMonitor(): (snapshot: MetricsSnapshot) => void {
  let lastLevel: HealthLevel = 'healthy';
  return (snapshot) => {
    const level = snapshot.health.decoder;
    if (level !== 'healthy' && level !== lastLevel) {
      log.info(dataQualityWarning(snapshot.decodeSuccessRatio, level));
    }
    lastLevel = level;
  };
}

/**
 * Consume a stream and print every message to stdout as one JSON line.
 */
export async function streamMessages(
  endpoint: string,
  options: StreamCommandOptions
): Promise<StreamSummary> {
  const config = loadStreamConfig(process.env, {
    maxBufferBytes: options.maxBuffer,
    maxPending: options.maxPending,
    processingRateMs: options.rate,
    connectTimeoutMs: options.connectTimeout,
    keepaliveIntervalMs: options.keepalive,
  });

  const collector = new StreamMetricsCollector();
  const transport = createTransport<StreamMessage>(options.transport, endpoint, {
    ...config,
    schema: isStreamMessage,
    overflowPolicy: options.overflow,
    sheddingPolicy: options.shed,
    metrics: collector,
  });
  transport.onDiagnostic(reportDiagnostic);

  const request = options.send;
  const supervisor = new StreamSupervisor(transport, endpoint, {
    maxAttempts: options.retries,
    onStatus: (status: SupervisorStatus) => {
      switch (status.status) {
        case 'connecting':
          log.info(connectingMessage(endpoint, transport.kind));
          break;
        case 'streaming':
          log.info(connectedMessage(endpoint));
          break;
        case 'retrying':
          log.info(retryingMessage(status.delayMs, status.attempt, options.retries));
          break;
        case 'gave_up':
          log.info(reconnectExhaustedError(options.retries, status.reason.message));
          break;
        case 'stopped':
          break;
      }
    },
    ...(request !== undefined && {
      onConnected: (client) => client.send(request),
    }),
  });

  const onSigint = (): void => {
    log.info(interruptedMessage());
    supervisor.stop().catch((error: unknown) => {
      log.debug(`Stop failed: ${String(error)}`);
    });
  };
  process.once('SIGINT', onSigint);

  const checkQuality = createQualityMonitor();
  const unsubscribe = collector.onSample((snapshot) => {
    checkQuality(snapshot);
    if (options.metrics) {
      log.info(formatMetricsLine(snapshot));
    }
  });
  collector.start(DEFAULT_METRICS_INTERVAL_MS);

  let received = 0;
  try {
    for await (const message of supervisor.messages()) {
      console.log(JSON.stringify(message.data));
      received++;
      if (options.limit !== undefined && received >= options.limit) {
        break;
      }
    }
  } catch (error) {
    if (error instanceof StreamConnectionError || error instanceof StreamTimeoutError) {
      throw new CommandError(
        error.message,
        { suggestion: connectionFailedSuggestion(endpoint) },
        error.exitCode
      );
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
    unsubscribe();
    collector.stop();
  }

  log.info(streamEndedMessage(received));
  return { endpoint, received, metrics: collector.sample() };
}

/**
 * Register the stream command.
 */
export function registerStreamCommand(program: Command): void {
  program
    .command('stream')
    .description('Consume a JSONL stream over Server-Sent Events or WebSocket')
    .argument('<endpoint>', 'Stream endpoint (http, https, ws or wss URL)', validateEndpoint)
    .addOption(
      new Option('--transport <kind>', 'Transport: sse, ws or auto (inferred from the scheme)')
        .default('auto')
        .argParser(parseTransportSelection)
    )
    .addOption(integerOption('--max-pending <n>', 'Queue capacity', { min: 1 }))
    .addOption(integerOption('--rate <ms>', 'Minimum milliseconds between messages', { min: 0 }))
    .addOption(integerOption('--max-buffer <bytes>', 'Line buffer limit in bytes', { min: 1 }))
    .addOption(
      new Option('--overflow <policy>', 'Line buffer overflow policy: reset or fail')
        .default('reset')
        .argParser(parseOverflowPolicy)
    )
    .addOption(
      new Option('--shed <policy>', 'Full-queue policy: drop or fail')
        .default('drop')
        .argParser(parseSheddingPolicy)
    )
    .addOption(integerOption('--connect-timeout <ms>', 'Handshake window', { min: 1 }))
    .addOption(
      integerOption('--keepalive <ms>', 'WebSocket ping interval (0 disables)', { min: 0 })
    )
    .addOption(
      integerOption('--retries <n>', 'Reconnection attempts after a failure', {
        min: 0,
      }).default(DEFAULT_RECONNECT_ATTEMPTS)
    )
    .addOption(
      new Option('--send <json>', 'Request sent after every connect').argParser((value) =>
        parseJsonValue('send', value)
      )
    )
    .addOption(integerOption('--limit <n>', 'Stop after N messages', { min: 1 }))
    .addOption(new Option('--metrics', 'Print periodic metrics to stderr').default(false))
    .addOption(jsonOption)
    .action(async (endpoint: string, options: StreamCommandOptions) => {
      await runCommand(
        async (opts: StreamCommandOptions) => {
          const summary = await streamMessages(endpoint, opts);
          if (opts.json) {
            console.error(JSON.stringify(summary));
          } else {
            console.error(formatMetricsSummary(summary.metrics));
          }
          return { success: true };
        },
        options
      );
    });
}
