import type { PolicyState } from "./policy.js";
import type {
  ChangeOutcome,
  ExitSignal,
  ReconcileFailurePolicy,
  ReconciliationSummary,
  RunReport,
  TerminationReason,
} from "./types.js";

export function deriveTermination(policy: PolicyState): TerminationReason {
  switch (policy.decision) {
    case "abort":
      return "aborted-fatal";
    case "halt":
      return "stopped-after-error";
    case "proceed":
      return "completed";
  }
}

export interface DeriveExitSignalInput {
  termination: TerminationReason;
  outcomes: readonly ChangeOutcome[];
  reconciliation: ReconciliationSummary;
  reconcileFailurePolicy: ReconcileFailurePolicy;
}

export function deriveExitSignal(input: DeriveExitSignalInput): ExitSignal {
  const { termination, outcomes, reconciliation, reconcileFailurePolicy } =
    input;

  if (termination === "aborted-fatal") {
    return "fatal";
  }
  if (termination === "stopped-after-error") {
    return "degraded";
  }
  if (outcomes.some((outcome) => outcome.error)) {
    return "degraded";
  }
  if (
    reconcileFailurePolicy === "degrade" &&
    reconciliation.failures.length > 0
  ) {
    return "degraded";
  }
  return "success";
}

/**
 * Process exit code for a finished run. A fatal abort exits with the
 * failing command's own status when it has one.
 */
export function resolveExitCode(report: RunReport): number {
  switch (report.exitSignal) {
    case "success":
      return 0;
    case "degraded":
      return 1;
    case "fatal": {
      const failing = report.outcomes.find((outcome) => outcome.error);
      const status = failing?.exitStatus;
      return typeof status === "number" && status > 0 ? status : 1;
    }
  }
}
