import {
  CommandFailure,
  ReconciliationFailure,
  TeardownFailure,
} from "../../../src/commands/run/errors.js";
import type {
  ChangeOutcome,
  RunReport,
} from "../../../src/commands/run/types.js";
import {
  createRunRenderer,
  renderRunSummary,
} from "../../../src/render/transcripts/run.js";
import { createCapturingWriter, stripAnsi } from "../../support/ansi.js";
import { buildChange } from "../../support/fakes/vcs.js";

function buildOutcome(overrides: Partial<ChangeOutcome> = {}): ChangeOutcome {
  return {
    changeId: "c1",
    description: "describe c1",
    createdChangeId: "copy-of-c1",
    exitStatus: 0,
    stdout: "",
    stderr: "",
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:01.500Z",
    durationMs: 1_500,
    ...overrides,
  };
}

function buildReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    revset: "trunk()..@",
    strategy: "continue",
    outcomes: [],
    termination: "completed",
    exitSignal: "success",
    reconciliation: {
      status: "completed",
      rewritten: [],
      unchanged: [],
      failures: [],
    },
    teardownFailures: [],
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:05.000Z",
    ...overrides,
  };
}

const FAILED_OUTCOME = buildOutcome({
  changeId: "c2",
  description: "describe c2",
  createdChangeId: "copy-of-c2",
  exitStatus: 1,
  durationMs: 250,
  error: new CommandFailure({ changeId: "c2", exitCode: 1 }),
});

describe("renderRunSummary", () => {
  it("renders the outcome table, failures and the undo hint", () => {
    const summary = renderRunSummary(
      buildReport({
        strategy: "stop",
        termination: "stopped-after-error",
        exitSignal: "degraded",
        operationId: "op-1",
        outcomes: [buildOutcome(), FAILED_OUTCOME],
        reconciliation: {
          status: "completed",
          rewritten: ["c1", "c2"],
          unchanged: [],
          failures: [],
        },
      }),
    );

    expect(stripAnsi(summary)).toBe(
      [
        "Result: STOPPED AFTER ERROR",
        "Revset: trunk()..@",
        "Strategy: stop",
        "",
        "CHANGE  STATUS  EXIT  DURATION",
        "c1      OK         0  2s      ",
        "c2      FAILED     1  250ms   ",
        "",
        "Failed changes:",
        "  - c2 describe c2: Command failed on change c2: exit code 1",
        "",
        "Rewrote 2 changes.",
        "",
        "To undo this run:",
        "  jj op restore op-1",
      ].join("\n"),
    );
  });

  it("reports an empty run and incomplete cleanup without an undo hint", () => {
    const summary = renderRunSummary(
      buildReport({
        operationId: "op-1",
        teardownFailures: [new TeardownFailure("remove-directory", "EBUSY")],
      }),
    );

    expect(stripAnsi(summary)).toBe(
      [
        "Result: COMPLETED",
        "Revset: trunk()..@",
        "Strategy: continue",
        "",
        "No changes processed.",
        "",
        "Rewrote 0 changes.",
        "",
        "Cleanup was incomplete:",
        "  - Teardown step remove-directory failed: EBUSY",
      ].join("\n"),
    );
  });

  it("lists failed rewrites and skipped reconciliation", () => {
    const partial = renderRunSummary(
      buildReport({
        outcomes: [buildOutcome()],
        reconciliation: {
          status: "completed",
          rewritten: [],
          unchanged: [],
          failures: [new ReconciliationFailure("c1", "copy-of-c1", "conflict")],
        },
      }),
    );
    const skipped = renderRunSummary(
      buildReport({
        strategy: "fatal",
        termination: "aborted-fatal",
        exitSignal: "fatal",
        outcomes: [FAILED_OUTCOME],
        reconciliation: {
          status: "skipped",
          rewritten: [],
          unchanged: [],
          failures: [],
        },
      }),
    );

    expect(stripAnsi(partial).split("\n").slice(-3)).toEqual([
      "Rewrote 0 changes.",
      "Failed to rewrite:",
      "  - Failed to rewrite change c1 from copy-of-c1: conflict",
    ]);
    expect(stripAnsi(skipped).split("\n")[0]).toBe("Result: ABORTED");
    expect(stripAnsi(skipped).split("\n").at(-1)).toBe("Reconciliation skipped.");
  });

  it("shows a dash for changes without an exit status", () => {
    const summary = renderRunSummary(
      buildReport({ outcomes: [buildOutcome({ exitStatus: null })] }),
    );

    expect(stripAnsi(summary)).toContain("c1      OK         -  2s      ");
  });
});

describe("createRunRenderer", () => {
  it("streams progress to stdout and failures to stderr", () => {
    const stdout = createCapturingWriter();
    const stderr = createCapturingWriter();
    const renderer = createRunRenderer({ stdout, stderr });
    const change = buildChange("c1");

    renderer.begin({
      revset: "mutable()",
      strategy: "continue",
      workspacePath: "/tmp/jj-run-1/jj-run-1",
    });
    renderer.resolved([change]);
    renderer.changeStarted(change, { index: 0, total: 1 });
    renderer.outputLine(change, "stdout", "hello");
    renderer.outputLine(change, "stderr", "oops");
    renderer.changeFinished(buildOutcome());
    renderer.changeFinished(
      buildOutcome({ error: new CommandFailure({ changeId: "c1", exitCode: 1 }) }),
    );

    expect(stdout.text()).toBe(
      [
        "Revset: mutable()",
        "Strategy: continue",
        "Workspace: /tmp/jj-run-1/jj-run-1",
        "Resolved 1 change.",
        "",
        "[1/1] c1 describe c1",
        "  c1 | hello",
        "  OK c1 (2s)",
        "",
      ].join("\n"),
    );
    expect(stderr.text()).toBe(
      "  c1 | oops\n  Error: Command failed on change c1: exit code 1\n",
    );
  });

  it("announces an empty revset and shortens long change ids", () => {
    const stdout = createCapturingWriter();
    const renderer = createRunRenderer({ stdout, stderr: createCapturingWriter() });
    const change = buildChange("kxyzkxyzkxyzkxyz", { description: "" });

    renderer.resolved([]);
    renderer.changeStarted(change, { index: 2, total: 5 });

    expect(stdout.text()).toBe(
      "No changes found to process.\n\n[3/5] kxyzkxyzkxyz (no description set)\n",
    );
  });

  it("stops writing once the summary is rendered", () => {
    const stdout = createCapturingWriter();
    const renderer = createRunRenderer({ stdout, stderr: createCapturingWriter() });

    const summary = renderer.complete(buildReport());
    renderer.outputLine(buildChange("c1"), "stdout", "late");

    expect(stripAnsi(summary).startsWith("Result: COMPLETED")).toBe(true);
    expect(stdout.text()).toBe("");
  });

  it("disables progress output after a failed write", () => {
    const stderr = createCapturingWriter();
    const stdout = {
      write: jest.fn((_chunk: string | Uint8Array): boolean => {
        throw new Error("EPIPE");
      }),
    };
    const renderer = createRunRenderer({ stdout, stderr });

    renderer.resolved([]);
    renderer.resolved([]);

    expect(stdout.write).toHaveBeenCalledTimes(1);
    expect(stderr.text()).toBe("[jj-run] Progress output disabled: EPIPE\n");
  });
});
