import {
  DisplayableError,
  type HintedErrorOptions,
} from "../../utils/errors.js";

export type RunErrorKind =
  | "session-init"
  | "revset"
  | "change-infrastructure"
  | "command"
  | "reconciliation"
  | "teardown"
  | "process-stream";

export abstract class RunCommandError extends DisplayableError {
  public abstract readonly kind: RunErrorKind;

  constructor(message: string, options: HintedErrorOptions = {}) {
    super(message, options);
  }
}

export class SessionInitError extends RunCommandError {
  public readonly kind = "session-init" as const;

  constructor(detail: string, options: HintedErrorOptions = {}) {
    super(`Failed to create temporary workspace: ${detail}`, options);
    this.name = "SessionInitError";
  }
}

export class RevsetError extends RunCommandError {
  public readonly kind = "revset" as const;
  public readonly revset: string;

  constructor(
    revset: string,
    headline: string,
    options: HintedErrorOptions = {},
  ) {
    super(headline, options);
    this.name = "RevsetError";
    this.revset = revset;
  }
}

export class ImmutableChangesError extends RevsetError {
  public readonly changeIds: readonly string[];

  constructor(revset: string, changeIds: readonly string[]) {
    super(revset, `Revset \`${revset}\` contains immutable changes.`, {
      detailLines: changeIds.map((id) => `  - ${id}`),
      hintLines: ["Narrow the revset to mutable changes, e.g. `(...) & mutable()`."],
    });
    this.name = "ImmutableChangesError";
    this.changeIds = Array.from(changeIds);
  }
}

/** Creating the mutable copy of a change failed; the command never ran. */
export class ChangeInfrastructureError extends RunCommandError {
  public readonly kind = "change-infrastructure" as const;
  public readonly changeId: string;

  constructor(changeId: string, detail: string) {
    super(`Failed to prepare change ${changeId}: ${detail}`);
    this.name = "ChangeInfrastructureError";
    this.changeId = changeId;
  }
}

export interface CommandFailureOptions {
  changeId: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  detail?: string;
}

export class CommandFailure extends RunCommandError {
  public readonly kind = "command" as const;
  public readonly changeId: string;
  public readonly exitCode: number | null;

  constructor(options: CommandFailureOptions) {
    const { changeId, exitCode = null, signal = null, detail } = options;
    super(`Command failed on change ${changeId}: ${describeFailure(exitCode, signal, detail)}`);
    this.name = "CommandFailure";
    this.changeId = changeId;
    this.exitCode = exitCode;
  }
}

function describeFailure(
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  detail: string | undefined,
): string {
  if (detail) {
    return detail;
  }
  if (signal) {
    return `terminated by ${signal}`;
  }
  return `exit code ${exitCode ?? "unknown"}`;
}

export class ReconciliationFailure extends RunCommandError {
  public readonly kind = "reconciliation" as const;
  public readonly originalChangeId: string;
  public readonly createdChangeId: string;

  constructor(originalChangeId: string, createdChangeId: string, detail: string) {
    super(
      `Failed to rewrite change ${originalChangeId} from ${createdChangeId}: ${detail}`,
    );
    this.name = "ReconciliationFailure";
    this.originalChangeId = originalChangeId;
    this.createdChangeId = createdChangeId;
  }
}

export type TeardownStep = "forget-workspace" | "abandon-change" | "remove-directory";

export class TeardownFailure extends RunCommandError {
  public readonly kind = "teardown" as const;
  public readonly step: TeardownStep;

  constructor(step: TeardownStep, detail: string) {
    super(`Teardown step ${step} failed: ${detail}`);
    this.name = "TeardownFailure";
    this.step = step;
  }
}

export class ProcessStreamError extends RunCommandError {
  public readonly kind = "process-stream" as const;

  constructor(detail: string) {
    super(detail);
    this.name = "ProcessStreamError";
  }
}

export type ChangeFailure = ChangeInfrastructureError | CommandFailure;
