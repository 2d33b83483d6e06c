/**
 * Engine states, in the order a clean run visits them.
 */
export const ENGINE_STATES = [
  "idle",
  "source_up",
  "load_up",
  "sweeping",
  "shutting_down",
  "done",
] as const;

export type EngineState = (typeof ENGINE_STATES)[number];

/**
 * Events that drive state transitions.
 * - `ok`: the current phase finished normally
 * - `fault`: an instrument or transport failure in the current phase
 * - `abort`: the operator asked to stop
 */
export type EngineEvent = "ok" | "fault" | "abort";

/**
 * Pure function: given current state + event, return next state.
 *
 * Every non-terminal state reaches `shutting_down` on a fault or abort, and
 * `shutting_down` always proceeds to `done`.
 */
export function nextState(current: EngineState, event: EngineEvent): EngineState {
  switch (current) {
    case "idle":
      return event === "ok" ? "source_up" : "shutting_down";
    case "source_up":
      return event === "ok" ? "load_up" : "shutting_down";
    case "load_up":
      return event === "ok" ? "sweeping" : "shutting_down";
    case "sweeping":
      return "shutting_down";
    case "shutting_down":
      return "done";
    case "done":
      throw new Error("done is terminal");
  }
}

export function isTerminal(state: EngineState): boolean {
  return state === "done";
}
