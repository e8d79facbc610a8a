import type { ChangeOutcome, ErrorStrategy } from "./types.js";

export type PolicyStatus = "running" | "halted";

/**
 * What the loop does after an outcome: keep going, stop taking new changes
 * but still reconcile, or stop and skip straight to teardown.
 */
export type PolicyDecision = "proceed" | "halt" | "abort";

export interface PolicyState {
  readonly strategy: ErrorStrategy;
  readonly status: PolicyStatus;
  readonly decision: PolicyDecision;
}

type OutcomeKind = "success" | "failure";

interface Transition {
  readonly status: PolicyStatus;
  readonly decision: PolicyDecision;
}

const PROCEED: Transition = { status: "running", decision: "proceed" };

const TRANSITIONS: Record<ErrorStrategy, Record<OutcomeKind, Transition>> = {
  continue: {
    success: PROCEED,
    failure: PROCEED,
  },
  stop: {
    success: PROCEED,
    failure: { status: "halted", decision: "halt" },
  },
  fatal: {
    success: PROCEED,
    failure: { status: "halted", decision: "abort" },
  },
};

export function createPolicyState(strategy: ErrorStrategy): PolicyState {
  return { strategy, ...PROCEED };
}

/** `halted` is absorbing: later outcomes never change a halted state. */
export function advancePolicy(
  state: PolicyState,
  outcome: Pick<ChangeOutcome, "error">,
): PolicyState {
  if (state.status === "halted") {
    return state;
  }

  const kind: OutcomeKind = outcome.error ? "failure" : "success";
  return { strategy: state.strategy, ...TRANSITIONS[state.strategy][kind] };
}

export function acceptsMoreChanges(state: PolicyState): boolean {
  return state.status === "running";
}

export function shouldReconcile(state: PolicyState): boolean {
  return state.decision !== "abort";
}
