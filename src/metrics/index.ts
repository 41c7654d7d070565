export {
  assessHealth,
  classifyConsumer,
  classifyDecoder,
  classifyQueue,
  computeTrend,
  DEFAULT_HEALTH_THRESHOLDS,
  worstOf,
  type HealthInputs,
  type HealthLevel,
  type HealthReport,
  type HealthThresholds,
  type Trend,
} from './health.js';
export {
  percentile,
  StreamMetricsCollector,
  type MetricsRecorder,
  type MetricsSnapshot,
  type MetricsTotals,
  type SampleListener,
  type StreamMetricsOptions,
} from './StreamMetricsCollector.js';
