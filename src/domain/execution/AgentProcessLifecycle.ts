export type AgentProcessState =
  | "SPAWNED"
  | "WRITING_INPUT"
  | "AWAITING_OUTPUT"
  | "COMPLETED"
  | "TIMED_OUT"
  | "KILLED";

export type AgentProcessEvent =
  | "inputStarted"
  | "inputClosed"
  | "exited"
  | "timeoutExpired"
  | "graceExpired";

const TRANSITIONS: Record<AgentProcessState, Partial<Record<AgentProcessEvent, AgentProcessState>>> = {
  SPAWNED: { inputStarted: "WRITING_INPUT", exited: "COMPLETED", timeoutExpired: "TIMED_OUT" },
  WRITING_INPUT: { inputClosed: "AWAITING_OUTPUT", exited: "COMPLETED", timeoutExpired: "TIMED_OUT" },
  AWAITING_OUTPUT: { exited: "COMPLETED", timeoutExpired: "TIMED_OUT" },
  TIMED_OUT: { graceExpired: "KILLED" },
  COMPLETED: {},
  KILLED: {},
};

/**
 * Tracks one agent process from spawn to exit. Events that do not apply to the
 * current state are ignored, so late timer callbacks and duplicate exit
 * notifications are harmless.
 */
export class AgentProcessLifecycle {
  private current: AgentProcessState = "SPAWNED";
  private exited = false;
  private readonly history: AgentProcessState[] = ["SPAWNED"];

  get value(): AgentProcessState {
    return this.current;
  }

  get timedOut(): boolean {
    return this.current === "TIMED_OUT" || this.current === "KILLED";
  }

  get states(): readonly AgentProcessState[] {
    return this.history;
  }

  dispatch(event: AgentProcessEvent): boolean {
    if (event === "exited") {
      this.exited = true;
    }
    if (event === "graceExpired" && this.exited) {
      return false;
    }
    const next = TRANSITIONS[this.current][event];
    if (!next) return false;
    this.current = next;
    this.history.push(next);
    return true;
  }
}
