import { describe, expect, it } from "vitest";
import { ENGINE_STATES, isTerminal, nextState, type EngineState } from "../src/core/state-machine.js";

describe("nextState", () => {
  it("walks the clean path on ok events", () => {
    const visited: EngineState[] = ["idle"];
    let state: EngineState = "idle";
    while (!isTerminal(state)) {
      state = nextState(state, "ok");
      visited.push(state);
    }
    expect(visited).toEqual([...ENGINE_STATES]);
  });

  it.each(["idle", "source_up", "load_up", "sweeping"] as const)("goes from %s to shutting_down on fault and abort", (state) => {
    expect(nextState(state, "fault")).toBe("shutting_down");
    expect(nextState(state, "abort")).toBe("shutting_down");
  });

  it("always leaves sweeping for shutting_down", () => {
    expect(nextState("sweeping", "ok")).toBe("shutting_down");
  });

  it("always finishes shutting_down", () => {
    expect(nextState("shutting_down", "fault")).toBe("done");
    expect(nextState("shutting_down", "ok")).toBe("done");
  });

  it("refuses to leave done", () => {
    expect(() => nextState("done", "ok")).toThrow("done is terminal");
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("shutting_down")).toBe(false);
  });
});
