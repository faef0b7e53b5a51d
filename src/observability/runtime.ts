import { Effect, ManagedRuntime } from "effect";
import { observabilityConfig, observabilityEnabled, observabilityLayer } from "./otel.js";

const runtime = ManagedRuntime.make(observabilityLayer);

const withEnvironmentTag = Effect.tagMetrics("environment", observabilityConfig.environment);

/** Runs an effect on the telemetry runtime; request handlers go through here. */
export function runPromise<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return runtime.runPromise(observabilityEnabled ? withEnvironmentTag(effect) : effect);
}

/** Flushes exporters; safe to call more than once. */
export function disposeObservability(): Promise<void> {
  return runtime.dispose();
}
