import {
  CommandFailure,
  ReconciliationFailure,
} from "../../../src/commands/run/errors.js";
import { createPolicyState } from "../../../src/commands/run/policy.js";
import {
  deriveExitSignal,
  deriveTermination,
  resolveExitCode,
} from "../../../src/commands/run/reports.js";
import { SKIPPED_RECONCILIATION } from "../../../src/commands/run/reconcile.js";
import type {
  ChangeOutcome,
  ReconciliationSummary,
  RunReport,
} from "../../../src/commands/run/types.js";

function buildOutcome(overrides: Partial<ChangeOutcome> = {}): ChangeOutcome {
  return {
    changeId: "c1",
    description: "describe c1",
    createdChangeId: "copy-of-c1",
    exitStatus: 0,
    stdout: "",
    stderr: "",
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:01.000Z",
    durationMs: 1_000,
    ...overrides,
  };
}

function buildReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    revset: "mutable()",
    strategy: "continue",
    outcomes: [],
    termination: "completed",
    exitSignal: "success",
    reconciliation: SKIPPED_RECONCILIATION,
    teardownFailures: [],
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:05.000Z",
    ...overrides,
  };
}

const FAILED_RECONCILIATION: ReconciliationSummary = {
  status: "completed",
  rewritten: [],
  unchanged: [],
  failures: [new ReconciliationFailure("c1", "copy-of-c1", "conflict")],
};

describe("deriveTermination", () => {
  it("maps policy decisions to termination reasons", () => {
    expect(deriveTermination(createPolicyState("continue"))).toBe("completed");
    expect(
      deriveTermination({ strategy: "stop", status: "halted", decision: "halt" }),
    ).toBe("stopped-after-error");
    expect(
      deriveTermination({
        strategy: "fatal",
        status: "halted",
        decision: "abort",
      }),
    ).toBe("aborted-fatal");
  });
});

describe("deriveExitSignal", () => {
  const failed = buildOutcome({
    exitStatus: 1,
    error: new CommandFailure({ changeId: "c1", exitCode: 1 }),
  });

  it("is success when every change passed", () => {
    expect(
      deriveExitSignal({
        termination: "completed",
        outcomes: [buildOutcome()],
        reconciliation: SKIPPED_RECONCILIATION,
        reconcileFailurePolicy: "warn",
      }),
    ).toBe("success");
  });

  it("is degraded when any change failed", () => {
    expect(
      deriveExitSignal({
        termination: "completed",
        outcomes: [buildOutcome(), failed],
        reconciliation: SKIPPED_RECONCILIATION,
        reconcileFailurePolicy: "warn",
      }),
    ).toBe("degraded");
  });

  it("follows the termination reason for stop and fatal", () => {
    const base = {
      outcomes: [failed],
      reconciliation: SKIPPED_RECONCILIATION,
      reconcileFailurePolicy: "warn" as const,
    };

    expect(
      deriveExitSignal({ ...base, termination: "stopped-after-error" }),
    ).toBe("degraded");
    expect(deriveExitSignal({ ...base, termination: "aborted-fatal" })).toBe(
      "fatal",
    );
  });

  it("only counts reconciliation failures under the degrade policy", () => {
    const base = {
      termination: "completed" as const,
      outcomes: [buildOutcome()],
      reconciliation: FAILED_RECONCILIATION,
    };

    expect(deriveExitSignal({ ...base, reconcileFailurePolicy: "warn" })).toBe(
      "success",
    );
    expect(
      deriveExitSignal({ ...base, reconcileFailurePolicy: "degrade" }),
    ).toBe("degraded");
  });
});

describe("resolveExitCode", () => {
  it("returns 0 for success and 1 for degraded runs", () => {
    expect(resolveExitCode(buildReport())).toBe(0);
    expect(resolveExitCode(buildReport({ exitSignal: "degraded" }))).toBe(1);
  });

  it("uses the failing command's status for a fatal run", () => {
    const report = buildReport({
      exitSignal: "fatal",
      outcomes: [
        buildOutcome(),
        buildOutcome({
          changeId: "c2",
          exitStatus: 7,
          error: new CommandFailure({ changeId: "c2", exitCode: 7 }),
        }),
      ],
    });

    expect(resolveExitCode(report)).toBe(7);
  });

  it("falls back to 1 when the fatal failure has no exit status", () => {
    const report = buildReport({
      exitSignal: "fatal",
      outcomes: [
        buildOutcome({
          exitStatus: null,
          error: new CommandFailure({
            changeId: "c1",
            detail: "cannot start command: spawn ENOENT",
          }),
        }),
      ],
    });

    expect(resolveExitCode(report)).toBe(1);
  });
});
