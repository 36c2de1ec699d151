export {
  COUNTER_NAMES,
  type CounterName,
  getMetricsSnapshot,
  incrementMetric,
  recordDuration,
  resetMetrics,
} from "./metrics";
