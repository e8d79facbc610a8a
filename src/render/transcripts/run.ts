import type { OutputStreamName } from "../../commands/run/output-sink.js";
import type {
  ChangeOutcome,
  ErrorStrategy,
  RunReport,
} from "../../commands/run/types.js";
import { colorize } from "../../utils/colors.js";
import { toErrorMessage } from "../../utils/errors.js";
import { formatErrorMessage, LOG_PREFIX } from "../../utils/output.js";
import type { ChangeSummary } from "../../vcs/types.js";
import {
  formatChangeLabel,
  formatDurationLabel,
  formatShortChangeId,
  formatTerminationLabel,
} from "../utils/changes.js";
import { renderTable } from "../utils/table.js";
import { renderTranscript } from "../utils/transcript.js";

type CliWriter = Pick<NodeJS.WriteStream, "write">;

export interface RunProgressContext {
  revset: string;
  strategy: ErrorStrategy;
  workspacePath: string;
}

export interface RunRendererOptions {
  stdout?: CliWriter;
  stderr?: CliWriter;
}

export interface ChangePosition {
  index: number;
  total: number;
}

export interface RunProgressRenderer {
  begin(context: RunProgressContext): void;
  resolved(changes: readonly ChangeSummary[]): void;
  changeStarted(change: ChangeSummary, position: ChangePosition): void;
  outputLine(
    change: ChangeSummary,
    stream: OutputStreamName,
    line: string,
  ): void;
  changeFinished(outcome: ChangeOutcome): void;
  complete(report: RunReport): string;
}

const DASH = "-";

export function createRunRenderer(
  options: RunRendererOptions = {},
): RunProgressRenderer {
  const stdout: CliWriter = options.stdout ?? process.stdout;
  const stderr: CliWriter = options.stderr ?? process.stderr;
  let disabled = false;

  function guard(action: () => void): void {
    if (disabled) {
      return;
    }
    try {
      action();
    } catch (error) {
      disabled = true;
      stderr.write(
        `${LOG_PREFIX} Progress output disabled: ${toErrorMessage(error)}\n`,
      );
    }
  }

  return {
    begin(context: RunProgressContext): void {
      guard(() => {
        const header = renderTranscript({
          fields: [
            ["Revset", context.revset],
            ["Strategy", context.strategy],
            ["Workspace", context.workspacePath],
          ],
        });
        stdout.write(`${header}\n`);
      });
    },
    resolved(changes: readonly ChangeSummary[]): void {
      guard(() => {
        stdout.write(
          changes.length === 0
            ? "No changes found to process.\n"
            : `Resolved ${changes.length} ${pluralize(changes.length, "change")}.\n`,
        );
      });
    },
    changeStarted(change: ChangeSummary, position: ChangePosition): void {
      guard(() => {
        stdout.write(
          `\n[${position.index + 1}/${position.total}] ${formatChangeLabel(change)}\n`,
        );
      });
    },
    outputLine(
      change: ChangeSummary,
      stream: OutputStreamName,
      line: string,
    ): void {
      guard(() => {
        const prefix = colorize(`${formatShortChangeId(change.changeId)} |`, "gray");
        const target = stream === "stderr" ? stderr : stdout;
        target.write(`  ${prefix} ${line}\n`);
      });
    },
    changeFinished(outcome: ChangeOutcome): void {
      guard(() => {
        if (outcome.error) {
          stderr.write(
            `  ${formatErrorMessage(outcome.error.messageForDisplay())}\n`,
          );
          return;
        }
        stdout.write(
          `  ${colorize("OK", "green")} ${formatShortChangeId(outcome.changeId)} (${formatDurationLabel(outcome.durationMs)})\n`,
        );
      });
    },
    complete(report: RunReport): string {
      disabled = true;
      return renderRunSummary(report);
    },
  };
}

export function renderRunSummary(report: RunReport): string {
  return renderTranscript({
    fields: [
      ["Result", formatTerminationLabel(report.termination)],
      ["Revset", report.revset],
      ["Strategy", report.strategy],
    ],
    sections: buildRunSummarySections(report),
    footer: buildUndoHint(report),
  });
}

export function buildRunSummarySections(report: RunReport): string[][] {
  const sections: string[][] = [];

  if (report.outcomes.length === 0) {
    sections.push(["No changes processed."]);
  } else {
    sections.push(
      renderTable<ChangeOutcome>(
        [
          {
            header: "CHANGE",
            cell: (outcome) => formatShortChangeId(outcome.changeId),
          },
          {
            header: "STATUS",
            cell: (outcome) =>
              outcome.error
                ? colorize("FAILED", "red")
                : colorize("OK", "green"),
          },
          {
            header: "EXIT",
            cell: (outcome) =>
              outcome.exitStatus === null ? DASH : `${outcome.exitStatus}`,
            align: "right",
          },
          {
            header: "DURATION",
            cell: (outcome) => formatDurationLabel(outcome.durationMs),
          },
        ],
        report.outcomes,
      ),
    );
  }

  const failed = report.outcomes.filter((outcome) => outcome.error);
  if (failed.length > 0) {
    sections.push([
      "Failed changes:",
      ...failed.map(
        (outcome) =>
          `  - ${formatChangeLabel(outcome)}: ${outcome.error?.messageForDisplay() ?? ""}`,
      ),
    ]);
  }

  sections.push(buildReconciliationLines(report));

  if (report.teardownFailures.length > 0) {
    sections.push([
      "Cleanup was incomplete:",
      ...report.teardownFailures.map(
        (failure) => `  - ${failure.messageForDisplay()}`,
      ),
    ]);
  }

  return sections;
}

function buildReconciliationLines(report: RunReport): string[] {
  const { reconciliation } = report;
  if (reconciliation.status === "skipped") {
    return ["Reconciliation skipped."];
  }

  const count = reconciliation.rewritten.length;
  const lines = [`Rewrote ${count} ${pluralize(count, "change")}.`];
  if (reconciliation.failures.length > 0) {
    lines.push(
      "Failed to rewrite:",
      ...reconciliation.failures.map(
        (failure) => `  - ${failure.messageForDisplay()}`,
      ),
    );
  }
  return lines;
}

function buildUndoHint(report: RunReport): string[] {
  if (!report.operationId || report.reconciliation.rewritten.length === 0) {
    return [];
  }
  return ["To undo this run:", `  jj op restore ${report.operationId}`];
}

function pluralize(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}
