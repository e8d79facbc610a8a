import type { ChangeId } from "../../vcs/types.js";
import type {
  ChangeFailure,
  ReconciliationFailure,
  TeardownFailure,
} from "./errors.js";

export const ERROR_STRATEGIES = ["continue", "stop", "fatal"] as const;
export type ErrorStrategy = (typeof ERROR_STRATEGIES)[number];

export const RECONCILE_FAILURE_POLICIES = ["warn", "degrade"] as const;
export type ReconcileFailurePolicy =
  (typeof RECONCILE_FAILURE_POLICIES)[number];

export type TerminationReason =
  | "completed"
  | "stopped-after-error"
  | "aborted-fatal";

export type ExitSignal = "success" | "degraded" | "fatal";

export interface ChangeOutcome {
  readonly changeId: ChangeId;
  readonly description: string;
  /** Absent when the mutable copy could not be created. */
  readonly createdChangeId?: ChangeId;
  readonly exitStatus: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly error?: ChangeFailure;
}

export interface CreatedChange {
  readonly original: ChangeId;
  readonly created: ChangeId;
}

export interface ReconciliationSummary {
  readonly status: "completed" | "skipped";
  readonly rewritten: readonly ChangeId[];
  readonly unchanged: readonly ChangeId[];
  readonly failures: readonly ReconciliationFailure[];
}

export interface RunReport {
  readonly revset: string;
  readonly strategy: ErrorStrategy;
  /** jj operation recorded before the run started, when it could be read. */
  readonly operationId?: string;
  readonly outcomes: readonly ChangeOutcome[];
  readonly termination: TerminationReason;
  readonly exitSignal: ExitSignal;
  readonly reconciliation: ReconciliationSummary;
  readonly teardownFailures: readonly TeardownFailure[];
  readonly startedAt: string;
  readonly finishedAt: string;
}
