import { Duration, Effect } from "effect";
import type { ClockifyClient } from "../../src/clockify/client.ts";
import {
  ClockifyError,
  type StartTimeEntryInput,
  type Tag,
  type TimeEntryRef,
} from "../../src/clockify/types.ts";

/** In-memory ClockifyClient that records every call. */
export class FakeClockifyClient implements ClockifyClient {
  tags: Tag[] = [];
  started: StartTimeEntryInput[] = [];
  stopped: Array<{ userId: string; end: Date }> = [];
  events: string[] = [];
  failWith: ClockifyError | null = null;
  delayMs = 0;
  private entrySeq = 0;

  constructor(private readonly userId = "user-1") {}

  listTags(): Effect.Effect<ReadonlyArray<Tag>, ClockifyError> {
    const failure = this.failWith;
    if (failure) return Effect.fail(failure);
    return Effect.succeed(this.tags);
  }

  startTimeEntry(input: StartTimeEntryInput): Effect.Effect<TimeEntryRef, ClockifyError> {
    const self = this;
    return Effect.gen(function* () {
      const label = input.tagIds.join(",") || "untagged";
      self.events.push(`begin ${label}`);
      if (self.delayMs > 0) yield* Effect.sleep(Duration.millis(self.delayMs));
      if (self.failWith) return yield* Effect.fail(self.failWith);
      self.started.push(input);
      self.entrySeq += 1;
      self.events.push(`end ${label}`);
      return { id: `entry-${self.entrySeq}`, userId: self.userId };
    });
  }

  stopRunningEntry(userId: string, end: Date): Effect.Effect<void, ClockifyError> {
    const failure = this.failWith;
    if (failure) return Effect.fail(failure);
    return Effect.sync(() => {
      this.stopped.push({ userId, end });
    });
  }
}

export function upstreamFailure(): ClockifyError {
  return new ClockifyError({
    operation: "startTimeEntry",
    status: 500,
    message: "POST /workspaces/ws-1/time-entries returned 500",
  });
}
