import { Hono } from "hono";

import { getMetricsSnapshot } from "@/lib/metrics";

const counterLine = (name: string, help: string, value: number): string =>
  [`# HELP ${name} ${help}`, `# TYPE ${name} counter`, `${name} ${value}`].join("\n");

const metrics = new Hono();

metrics.get("/", (c) => {
  const { counters, httpRequestDurations } = getMetricsSnapshot();
  const below = (limitMs: number): number => httpRequestDurations.filter((d) => d < limitMs).length;

  const prometheusFormat = [
    counterLine("http_requests_total", "Total number of HTTP requests", counters.httpRequestsTotal),
    [
      "# HELP http_request_duration_seconds HTTP request duration in seconds",
      "# TYPE http_request_duration_seconds histogram",
      `http_request_duration_seconds_bucket{le="0.1"} ${below(100)}`,
      `http_request_duration_seconds_bucket{le="0.5"} ${below(500)}`,
      `http_request_duration_seconds_bucket{le="1.0"} ${below(1000)}`,
      `http_request_duration_seconds_bucket{le="+Inf"} ${httpRequestDurations.length}`,
    ].join("\n"),
    counterLine("control_ticks_total", "Control loop ticks", counters.ticksTotal),
    counterLine("state_transitions_total", "Robot state transitions", counters.transitionsTotal),
    counterLine("orders_accepted_total", "Orders accepted at pickup", counters.ordersAccepted),
    counterLine("orders_rejected_total", "Orders rejected on submission", counters.ordersRejected),
    counterLine(
      "navigation_failures_total",
      "Navigation failures and timeouts that forced the Error state",
      counters.navigationFailures,
    ),
    counterLine("effect_failures_total", "Effects and feedback calls that threw", counters.effectFailures),
  ].join("\n\n");

  return c.text(prometheusFormat, 200, {
    "Content-Type": "text/plain; version=0.0.4",
  });
});

export { metrics };
