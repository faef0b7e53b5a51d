import { Effect, Metric, MetricBoundaries } from "effect";
import { observabilityEnabled } from "./otel.js";

const httpRequestsTotal = Metric.counter("http_requests_total", {
  description: "Total HTTP requests",
  incremental: true,
});
const httpRequestDurationMs = Metric.histogram(
  "http_request_duration_ms",
  MetricBoundaries.linear({ start: 0, width: 50, count: 40 }),
  "HTTP request duration in ms"
);

const clockActionsTotal = Metric.counter("clock_actions_total", {
  description: "Clock-in and clock-out actions taken",
  incremental: true,
});

const upstreamCallsTotal = Metric.counter("clockify_requests_total", {
  description: "Requests sent to the Clockify API",
  incremental: true,
});
const upstreamDurationMs = Metric.histogram(
  "clockify_request_duration_ms",
  MetricBoundaries.linear({ start: 0, width: 100, count: 25 }),
  "Clockify request duration in ms"
);

const errorsTotal = Metric.counter("errors_total", {
  description: "Total errors",
  incremental: true,
});

function withTags<Type, In, Out>(
  metric: Metric.Metric<Type, In, Out>,
  tags: Record<string, string>
): Metric.Metric<Type, In, Out> {
  let tagged = metric;
  for (const [key, value] of Object.entries(tags)) {
    tagged = Metric.tagged(tagged, key, value);
  }
  return tagged;
}

export function recordHttpMetrics(params: {
  method: string;
  route: string;
  status: string;
  durationMs: number;
}): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(httpRequestsTotal, {
    method: params.method,
    route: params.route,
    status: params.status,
  });
  const duration = withTags(httpRequestDurationMs, {
    method: params.method,
    route: params.route,
  });
  return Effect.all([
    counter(Effect.succeed(1)),
    duration(Effect.succeed(params.durationMs)),
  ]).pipe(Effect.asVoid);
}

export function recordClockAction(action: string, tag: string): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(clockActionsTotal, { action, tag });
  return counter(Effect.succeed(1)).pipe(Effect.asVoid);
}

export function recordUpstreamCall(
  operation: string,
  status: "ok" | "error",
  durationMs: number
): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(upstreamCallsTotal, { operation, status });
  const duration = withTags(upstreamDurationMs, { operation });
  return Effect.all([
    counter(Effect.succeed(1)),
    duration(Effect.succeed(durationMs)),
  ]).pipe(Effect.asVoid);
}

export function recordError(errorType: string): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(errorsTotal, { error_type: errorType });
  return counter(Effect.succeed(1)).pipe(Effect.asVoid);
}
