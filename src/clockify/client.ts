import { Duration, Effect, ParseResult, Schema } from "effect";
import type { ClockifyConfigType } from "../config/index.js";
import { describeError } from "../logger.js";
import { recordUpstreamCall, withSpan } from "../observability/index.js";
import {
  ClockifyError,
  TagListSchema,
  TimeEntryRefSchema,
  type ClockifyOperation,
  type StartTimeEntryInput,
  type Tag,
  type TimeEntryRef,
} from "./types.js";

export interface ClockifyClient {
  listTags(): Effect.Effect<ReadonlyArray<Tag>, ClockifyError>;
  startTimeEntry(input: StartTimeEntryInput): Effect.Effect<TimeEntryRef, ClockifyError>;
  /** Sets `end` on the user's running entry. */
  stopRunningEntry(userId: string, end: Date): Effect.Effect<void, ClockifyError>;
}

export type ClockifyClientOptions = {
  fetchImpl?: typeof fetch;
};

type HttpMethod = "GET" | "POST" | "PATCH";

export function makeClockifyClient(
  config: ClockifyConfigType,
  options: ClockifyClientOptions = {}
): ClockifyClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const workspacePath = `/workspaces/${encodeURIComponent(config.workspaceId)}`;
  const headers = {
    "x-api-key": config.apiKey,
    "Content-Type": "application/json",
    "User-Agent": config.userAgent,
  };

  const send = (
    operation: ClockifyOperation,
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Effect.Effect<unknown, ClockifyError> => {
    const url = `${config.baseUrl}${path}`;
    const startedAt = Date.now();
    return Effect.suspend(() => {
      // One signal for the request and its body read, aborted on interrupt.
      const controller = new AbortController();
      return Effect.gen(function* () {
        const response = yield* Effect.tryPromise({
          try: () =>
            fetchImpl(url, {
              method,
              headers,
              body: body === undefined ? undefined : JSON.stringify(body),
              signal: controller.signal,
            }),
          catch: (cause) =>
            new ClockifyError({
              operation,
              message: `${method} ${path} failed: ${describeError(cause)}`,
              cause,
            }),
        });

        const text = yield* Effect.tryPromise({
          try: () => response.text(),
          catch: (cause) =>
            new ClockifyError({
              operation,
              status: response.status,
              message: `${method} ${path} body unreadable: ${describeError(cause)}`,
              cause,
            }),
        });

        if (!response.ok) {
          return yield* new ClockifyError({
            operation,
            status: response.status,
            message: `${method} ${path} returned ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`,
          });
        }
        if (!text.trim()) return null;

        return yield* Effect.try({
          try: (): unknown => JSON.parse(text),
          catch: (cause) =>
            new ClockifyError({
              operation,
              status: response.status,
              message: `${method} ${path} returned invalid JSON`,
              cause,
            }),
        });
      }).pipe(
        Effect.onInterrupt(() => Effect.sync(() => controller.abort())),
        Effect.timeoutFail({
          duration: Duration.millis(config.timeoutMs),
          onTimeout: () =>
            new ClockifyError({
              operation,
              message: `${method} ${path} timed out after ${config.timeoutMs}ms`,
            }),
        })
      );
    }).pipe(
      withSpan("clockify.request", {
        attributes: {
          "clockify.operation": operation,
          "http.method": method,
        },
      }),
      Effect.tapBoth({
        onFailure: () => recordUpstreamCall(operation, "error", Date.now() - startedAt),
        onSuccess: () => recordUpstreamCall(operation, "ok", Date.now() - startedAt),
      })
    );
  };

  const decode = <A, I>(
    operation: ClockifyOperation,
    schema: Schema.Schema<A, I>,
    value: unknown
  ): Effect.Effect<A, ClockifyError> =>
    Schema.decodeUnknown(schema)(value).pipe(
      Effect.mapError(
        (error) =>
          new ClockifyError({
            operation,
            message: `unexpected response: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
            cause: error,
          })
      )
    );

  return {
    listTags: () =>
      send("listTags", "GET", `${workspacePath}/tags`).pipe(
        Effect.flatMap((payload) => decode("listTags", TagListSchema, payload))
      ),

    startTimeEntry: (input) =>
      send("startTimeEntry", "POST", `${workspacePath}/time-entries`, {
        start: input.start.toISOString(),
        billable: true,
        description: input.description,
        projectId: config.projectId,
        tagIds: [...input.tagIds],
      }).pipe(
        Effect.flatMap((payload) => decode("startTimeEntry", TimeEntryRefSchema, payload))
      ),

    stopRunningEntry: (userId, end) =>
      send(
        "stopRunningEntry",
        "PATCH",
        `${workspacePath}/user/${encodeURIComponent(userId)}/time-entries`,
        { end: end.toISOString() }
      ).pipe(Effect.asVoid),
  };
}
