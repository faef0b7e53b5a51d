import type { TimeEntryRef } from "../clockify/types.js";
import type { WorkSignal, WorkingState } from "./types.js";

const SIGNAL_FIELD = {
  at_work: "atWork",
  on_laptop: "onLaptop",
  on_phone: "onPhone",
} as const satisfies Record<WorkSignal, keyof WorkingState>;

/**
 * In-memory presence flags plus the entry to close on the next clock-out.
 * One instance per process, handed to the tracker; nothing is persisted.
 */
export class WorkStateStore {
  private state: WorkingState = { atWork: false, onLaptop: false, onPhone: false };
  private entry: TimeEntryRef | null = null;

  /** Applies one signal and returns a copy of the resulting state. */
  set(signal: WorkSignal, value: boolean): WorkingState {
    this.state = { ...this.state, [SIGNAL_FIELD[signal]]: value };
    return this.snapshot();
  }

  snapshot(): WorkingState {
    return { ...this.state };
  }

  rememberEntry(entry: TimeEntryRef): void {
    this.entry = { id: entry.id, userId: entry.userId };
  }

  lastEntry(): TimeEntryRef | null {
    return this.entry;
  }
}
