import type { TimeEntryRef } from "../clockify/types.js";

export interface WorkingState {
  atWork: boolean;
  onLaptop: boolean;
  onPhone: boolean;
}

export const WORK_SIGNALS = ["at_work", "on_laptop", "on_phone"] as const;

export type WorkSignal = (typeof WORK_SIGNALS)[number];

export type TrackerAction =
  | { kind: "clock_in"; description: string; tag: string }
  | { kind: "clock_out" }
  | { kind: "none" };

export interface ReportOutcome {
  state: WorkingState;
  action: TrackerAction;
  /** Entry opened by this report, if it clocked in. */
  entry?: TimeEntryRef;
  /** True when a clock-out found no remembered entry to close. */
  skipped?: boolean;
}
