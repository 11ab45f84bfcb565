/**
 * Run state machine for one duplicate check invocation
 */

import type { DedupRunState } from "@/types";

const TRANSITIONS: Record<DedupRunState, readonly DedupRunState[]> = {
  Idle: ["Detecting"],
  Detecting: ["Clean", "Dirty", "Failed"],
  Clean: [],
  Dirty: ["Cleaning"],
  Cleaning: ["Committed", "Failed"],
  Committed: ["Verifying"],
  Verifying: ["VerifiedClean", "VerificationFailed", "Failed"],
  VerifiedClean: [],
  VerificationFailed: [],
  Failed: [],
};

/**
 * States a run may end in. Dirty is terminal when cleanup is not
 * requested or is declined.
 */
export const TERMINAL_STATES: readonly DedupRunState[] = [
  "Clean",
  "Dirty",
  "VerifiedClean",
  "VerificationFailed",
  "Failed",
];

export class RunStateMachine {
  private current: DedupRunState = "Idle";
  private readonly visited: DedupRunState[] = ["Idle"];

  get state(): DedupRunState {
    return this.current;
  }

  get history(): readonly DedupRunState[] {
    return this.visited;
  }

  canTransition(next: DedupRunState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  /**
   * @throws Error on a transition the run model does not allow
   */
  transition(next: DedupRunState): DedupRunState {
    if (!this.canTransition(next)) {
      throw new Error(
        `Invalid run state transition: ${this.current} -> ${next}`,
      );
    }
    this.current = next;
    this.visited.push(next);
    return next;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.current);
  }
}
