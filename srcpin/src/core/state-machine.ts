/**
 * States of one pinning run, in order.
 */
export const RUN_STATES = ["collecting", "dispatched", "completed", "aborted"] as const;

export type RunState = (typeof RUN_STATES)[number];

/**
 * Events that drive run transitions.
 *
 * - `dispatch`: every task has been handed to its resolver
 * - `fatal`: a task failed in a way that ends the run
 * - `settled`: every dispatched task has finished
 */
export type RunEvent = "dispatch" | "fatal" | "settled";

export function isTerminal(state: RunState): boolean {
  return state === "completed" || state === "aborted";
}

/**
 * Pure function: given the current state and an event, return the next state.
 * A fatal error after the first one leaves an aborted run aborted.
 */
export function nextRunState(current: RunState, event: RunEvent): RunState {
  switch (current) {
    case "collecting":
      if (event === "dispatch") return "dispatched";
      if (event === "settled") return "completed";
      break;
    case "dispatched":
      if (event === "fatal") return "aborted";
      if (event === "settled") return "completed";
      break;
    case "aborted":
      if (event === "fatal" || event === "settled") return "aborted";
      break;
    case "completed":
      break;
  }
  throw new Error(`invalid run transition: ${current} + ${event}`);
}
