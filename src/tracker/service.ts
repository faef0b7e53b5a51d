import { Effect } from "effect";
import type { ClockifyClient } from "../clockify/client.js";
import type { ClockifyError } from "../clockify/types.js";
import type { Logger } from "../logger.js";
import {
  annotateError,
  annotateSpan,
  recordClockAction,
  recordError,
  withSpan,
} from "../observability/index.js";
import { describeAction, describeState, evaluateState } from "./evaluate.js";
import type { WorkStateStore } from "./store.js";
import type { TagMap } from "./tags.js";
import type { ReportOutcome, TrackerAction, WorkSignal, WorkingState } from "./types.js";

export interface WorkTracker {
  report(signal: WorkSignal, value: boolean): Effect.Effect<ReportOutcome, ClockifyError>;
}

export type WorkTrackerDeps = {
  client: ClockifyClient;
  store: WorkStateStore;
  tags: TagMap;
  logger: Logger;
  now?: () => Date;
};

export function makeWorkTracker(deps: WorkTrackerDeps): WorkTracker {
  const { client, store, tags, logger } = deps;
  const now = deps.now ?? (() => new Date());
  // Reports touch the store before and after an upstream call, so they
  // run one at a time.
  const lock = Effect.unsafeMakeSemaphore(1);

  const clockIn = (
    state: WorkingState,
    action: Extract<TrackerAction, { kind: "clock_in" }>
  ): Effect.Effect<ReportOutcome, ClockifyError> => {
    const tagId = tags.get(action.tag);
    if (tagId === undefined) {
      logger.warn(`tag ${action.tag} not found in workspace, clocking in without it`);
    }
    return client
      .startTimeEntry({
        start: now(),
        description: action.description,
        tagIds: tagId === undefined ? [] : [tagId],
      })
      .pipe(
        Effect.tap((entry) =>
          Effect.sync(() => {
            store.rememberEntry(entry);
            logger.info(`Clock in ${action.description} ${action.tag} entry=${entry.id}`);
          })
        ),
        Effect.map((entry): ReportOutcome => ({ state, action, entry }))
      );
  };

  const clockOut = (
    state: WorkingState,
    action: Extract<TrackerAction, { kind: "clock_out" }>
  ): Effect.Effect<ReportOutcome, ClockifyError> => {
    const last = store.lastEntry();
    if (!last) {
      logger.info("Clock out skipped, no entry has been opened yet");
      return Effect.succeed({ state, action, skipped: true });
    }
    return client.stopRunningEntry(last.userId, now()).pipe(
      Effect.tap(() =>
        Effect.sync(() => logger.info(`Clock out user=${last.userId} entry=${last.id}`))
      ),
      Effect.as<ReportOutcome>({ state, action })
    );
  };

  return {
    report: (signal, value) =>
      Effect.gen(function* () {
        const state = store.set(signal, value);
        const action = evaluateState(state);
        logger.debug(`${signal}=${value} -> ${describeState(state)} -> ${describeAction(action)}`);
        yield* annotateSpan({ "tracker.action": action.kind });
        if (action.kind === "none") {
          logger.info(`No activity for ${describeState(state)}, leaving the running entry as is`);
          const idle: ReportOutcome = { state, action };
          return idle;
        }
        const outcome =
          action.kind === "clock_in"
            ? yield* clockIn(state, action)
            : yield* clockOut(state, action);
        yield* recordClockAction(
          action.kind,
          action.kind === "clock_in" ? action.tag : "none"
        );
        return outcome;
      }).pipe(
        Effect.tapError((err) =>
          Effect.all([recordError("clockify"), annotateError(err)]).pipe(Effect.asVoid)
        ),
        withSpan("tracker.report", {
          attributes: { "tracker.signal": signal, "tracker.value": value },
        }),
        lock.withPermits(1)
      ),
  };
}
