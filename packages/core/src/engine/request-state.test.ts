import { describe, it, expect } from "vitest";
import {
  RequestStateMachine,
  type RequestState,
  type RequestTransitionEvent,
} from "./request-state.js";

const HAPPY_PATH: RequestState[] = ["normalized", "resolved", "dispatched", "responded"];

function walkTo(sm: RequestStateMachine, state: RequestState): void {
  for (const next of HAPPY_PATH) {
    if (sm.getState() === state) return;
    sm.transition(next);
  }
}

describe("RequestStateMachine", () => {
  it("starts in received state", () => {
    const sm = new RequestStateMachine();
    expect(sm.getState()).toBe("received");
    expect(sm.isTerminal()).toBe(false);
  });

  it("transitions through the happy path", () => {
    const sm = new RequestStateMachine();
    for (const state of HAPPY_PATH) {
      sm.transition(state);
      expect(sm.getState()).toBe(state);
    }
    expect(sm.isTerminal()).toBe(true);
  });

  it.each(["received", "normalized", "resolved", "dispatched"] as const)(
    "allows errored from %s",
    (state) => {
      const sm = new RequestStateMachine();
      walkTo(sm, state);

      expect(sm.canTransition("errored")).toBe(true);
      sm.transition("errored");
      expect(sm.getState()).toBe("errored");
      expect(sm.isTerminal()).toBe(true);
    },
  );

  it("rejects skipping a step", () => {
    const sm = new RequestStateMachine();
    expect(sm.canTransition("dispatched")).toBe(false);
    expect(() => sm.transition("dispatched")).toThrow(
      "Invalid request state transition: received -> dispatched",
    );
  });

  it("does not leave a terminal state", () => {
    const responded = new RequestStateMachine();
    walkTo(responded, "responded");
    expect(responded.canTransition("errored")).toBe(false);

    const errored = new RequestStateMachine();
    errored.transition("errored");
    expect(errored.canTransition("received")).toBe(false);
    expect(errored.canTransition("normalized")).toBe(false);
  });

  it("notifies listeners until they unsubscribe", () => {
    const sm = new RequestStateMachine();
    const events: RequestTransitionEvent[] = [];
    const unsubscribe = sm.onStateChange((e) => events.push(e));

    sm.transition("normalized", "about");
    unsubscribe();
    sm.transition("resolved");

    expect(events).toHaveLength(1);
    expect(events[0].from).toBe("received");
    expect(events[0].to).toBe("normalized");
    expect(events[0].reason).toBe("about");
  });
});
