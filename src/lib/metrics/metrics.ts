/**
 * Process-wide counters exported by the /metrics route.
 */

export const COUNTER_NAMES = [
  "httpRequestsTotal",
  "ticksTotal",
  "transitionsTotal",
  "ordersAccepted",
  "ordersRejected",
  "navigationFailures",
  "effectFailures",
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

const MAX_DURATIONS = 1000;

const counters: Record<CounterName, number> = {
  httpRequestsTotal: 0,
  ticksTotal: 0,
  transitionsTotal: 0,
  ordersAccepted: 0,
  ordersRejected: 0,
  navigationFailures: 0,
  effectFailures: 0,
};

const httpRequestDurations: number[] = [];

export const incrementMetric = (metric: CounterName, by = 1): void => {
  counters[metric] += by;
};

export const recordDuration = (durationMs: number): void => {
  httpRequestDurations.push(durationMs);
  // Keep only the latest durations
  if (httpRequestDurations.length > MAX_DURATIONS) {
    httpRequestDurations.shift();
  }
};

export const getMetricsSnapshot = (): {
  counters: Readonly<Record<CounterName, number>>;
  httpRequestDurations: readonly number[];
} => ({
  counters: { ...counters },
  httpRequestDurations: [...httpRequestDurations],
});

export const resetMetrics = (): void => {
  for (const name of COUNTER_NAMES) {
    counters[name] = 0;
  }
  httpRequestDurations.length = 0;
};
