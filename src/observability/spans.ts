import { Effect } from "effect";
import { observabilityEnabled } from "./otel.js";

export type SpanAttributes = Record<string, string | number | boolean>;

/** `Effect.withSpan` when telemetry is on, identity otherwise. */
export function withSpan<A, E, R>(
  name: string,
  options?: { attributes?: SpanAttributes }
): (effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R> {
  if (!observabilityEnabled) {
    return (effect) => effect;
  }
  return Effect.withSpan(name, options);
}

export function annotateSpan(attributes: SpanAttributes): Effect.Effect<void> {
  if (!observabilityEnabled) {
    return Effect.void;
  }
  return Effect.annotateCurrentSpan(attributes);
}

function errorType(err: unknown): string {
  if (err && typeof err === "object" && "_tag" in err && typeof err._tag === "string") {
    return err._tag;
  }
  return err instanceof Error ? err.name : "error";
}

/** Records the failure's tag, message and upstream status on the current span. */
export function annotateError(err: unknown): Effect.Effect<void> {
  const attributes: SpanAttributes = {
    "error.type": errorType(err),
    "error.message": err instanceof Error ? err.message : String(err),
  };
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    attributes["upstream.status_code"] = err.status;
  }
  return annotateSpan(attributes);
}
