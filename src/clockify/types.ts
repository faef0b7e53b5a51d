import { Data, Schema } from "effect";

export const TagSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
});

export type Tag = Schema.Schema.Type<typeof TagSchema>;

export const TagListSchema = Schema.Array(TagSchema);

/** The parts of a created time entry needed to close it later. */
export const TimeEntryRefSchema = Schema.Struct({
  id: Schema.String,
  userId: Schema.String,
});

export type TimeEntryRef = Schema.Schema.Type<typeof TimeEntryRefSchema>;

export interface StartTimeEntryInput {
  start: Date;
  description: string;
  tagIds: ReadonlyArray<string>;
}

export type ClockifyOperation = "listTags" | "startTimeEntry" | "stopRunningEntry";

export class ClockifyError extends Data.TaggedError("ClockifyError")<{
  readonly operation: ClockifyOperation;
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}
