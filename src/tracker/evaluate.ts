import type { TrackerAction, WorkingState } from "./types.js";

const NORMAL_WORK = "Normal Work";
const REMOTE_WORK = "Remote Work";
const REMOTE_CALL = "Remote Work/Call";

function clockIn(description: string, tag: string): TrackerAction {
  return { kind: "clock_in", description, tag };
}

/**
 * Maps the three presence flags to the time entry that should be running.
 * Nothing set means clock out; otherwise the desk decides the description
 * and the most specific device (phone over laptop over desk) picks the tag.
 * At the desk on the phone without the laptop has no rule and leaves the
 * running entry alone.
 */
export function evaluateState(state: WorkingState): TrackerAction {
  const { atWork, onLaptop, onPhone } = state;
  if (atWork) {
    if (onLaptop) return clockIn(NORMAL_WORK, onPhone ? "@Phone" : "@PC");
    if (onPhone) return { kind: "none" };
    return clockIn(NORMAL_WORK, "@Work");
  }
  if (onLaptop) {
    return clockIn(REMOTE_WORK, onPhone ? "@Phone" : "@PC");
  }
  if (onPhone) return clockIn(REMOTE_CALL, "@Phone");
  return { kind: "clock_out" };
}

export function describeState(state: WorkingState): string {
  return `at_work=${state.atWork} on_laptop=${state.onLaptop} on_phone=${state.onPhone}`;
}

export function describeAction(action: TrackerAction): string {
  switch (action.kind) {
    case "clock_in":
      return `clock in "${action.description}" ${action.tag}`;
    case "clock_out":
      return "clock out";
    case "none":
      return "no activity";
  }
}
