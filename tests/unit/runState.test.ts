/**
 * Unit Test: run state machine
 */

import { describe, it, expect } from "vitest";
import { RunStateMachine } from "@/dedup";

describe("RunStateMachine", () => {
  it("should walk the full cleanup path", () => {
    const machine = new RunStateMachine();

    for (const state of [
      "Detecting",
      "Dirty",
      "Cleaning",
      "Committed",
      "Verifying",
      "VerifiedClean",
    ] as const) {
      machine.transition(state);
    }

    expect(machine.state).toBe("VerifiedClean");
    expect(machine.isTerminal()).toBe(true);
    expect(machine.history).toEqual([
      "Idle",
      "Detecting",
      "Dirty",
      "Cleaning",
      "Committed",
      "Verifying",
      "VerifiedClean",
    ]);
  });

  it("should treat Clean and Dirty as terminal after detection", () => {
    const clean = new RunStateMachine();
    clean.transition("Detecting");
    clean.transition("Clean");

    expect(clean.isTerminal()).toBe(true);
    expect(clean.canTransition("Cleaning")).toBe(false);

    const dirty = new RunStateMachine();
    dirty.transition("Detecting");
    dirty.transition("Dirty");
    expect(dirty.isTerminal()).toBe(true);
  });

  it("should reject cleaning without detection", () => {
    const machine = new RunStateMachine();

    expect(() => machine.transition("Cleaning")).toThrow(
      "Invalid run state transition: Idle -> Cleaning",
    );
    expect(machine.state).toBe("Idle");
  });

  it("should never leave VerificationFailed", () => {
    const machine = new RunStateMachine();
    for (const state of [
      "Detecting",
      "Dirty",
      "Cleaning",
      "Committed",
      "Verifying",
      "VerificationFailed",
    ] as const) {
      machine.transition(state);
    }

    expect(machine.canTransition("Cleaning")).toBe(false);
    expect(machine.canTransition("Verifying")).toBe(false);
  });
});
