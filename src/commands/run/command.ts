import type { RunProgressRenderer } from "../../render/transcripts/run.js";
import { logWarning } from "../../utils/output.js";
import { describeVcsError } from "../../vcs/jj.js";
import type { ChangeId, ChangeSummary, VcsClient } from "../../vcs/types.js";
import {
  type TeardownReport,
  type WorkspaceHandle,
  WorkspaceSession,
} from "../../workspace/session.js";
import type { ProcessExecutor } from "./executor.js";
import { clearActiveRun, registerActiveRun } from "./lifecycle.js";
import {
  acceptsMoreChanges,
  advancePolicy,
  createPolicyState,
  type PolicyState,
  shouldReconcile,
} from "./policy.js";
import { reconcileSnapshots, SKIPPED_RECONCILIATION } from "./reconcile.js";
import { deriveExitSignal, deriveTermination } from "./reports.js";
import { resolveRevset } from "./resolver.js";
import { runChange } from "./runner.js";
import type {
  ChangeOutcome,
  CreatedChange,
  ErrorStrategy,
  ReconcileFailurePolicy,
  ReconciliationSummary,
  RunReport,
} from "./types.js";

export type RunPhase =
  | "idle"
  | "session-open"
  | "resolving"
  | "looping"
  | "reconciling"
  | "tearing-down"
  | "done";

export interface RunCommandInput {
  root: string;
  command: string;
  revset: string;
  strategy: ErrorStrategy;
  reconcileFailurePolicy?: ReconcileFailurePolicy;
  vcs: VcsClient;
  executor: ProcessExecutor;
  renderer?: RunProgressRenderer;
  /** Directory the temporary workspace is created under; defaults to the OS temp dir. */
  tempDirectory?: string;
  onPhase?: (phase: RunPhase) => void;
  now?: () => number;
}

/**
 * Runs the command on every change of the revset inside one temporary
 * workspace. The workspace is closed exactly once on every exit path;
 * session and revset failures are re-thrown after teardown.
 */
export async function executeRunCommand(
  input: RunCommandInput,
): Promise<RunReport> {
  const {
    root,
    command,
    revset,
    strategy,
    reconcileFailurePolicy = "warn",
    vcs,
    executor,
    renderer,
    tempDirectory,
    onPhase,
  } = input;
  const now = input.now ?? Date.now;
  const startedAt = new Date(now()).toISOString();

  const operationId = await readCurrentOperation(vcs, root);
  const session = new WorkspaceSession({ root, vcs, tempDirectory });
  const outcomes: ChangeOutcome[] = [];
  const created: CreatedChange[] = [];
  // Every copy that exists, including one whose command is still running.
  const materialized: ChangeId[] = [];
  let policy = createPolicyState(strategy);
  let reconciliation: ReconciliationSummary = SKIPPED_RECONCILIATION;
  let teardown: TeardownReport;

  registerActiveRun({
    session,
    createdChanges: () => materialized,
  });

  try {
    onPhase?.("session-open");
    const handle = await session.open();
    renderer?.begin({ revset, strategy, workspacePath: handle.path });

    onPhase?.("resolving");
    const changes = await resolveRevset({ vcs, handle, revset });
    renderer?.resolved(changes);

    onPhase?.("looping");
    policy = await runChangeLoop({
      vcs,
      executor,
      handle,
      changes,
      command,
      policy,
      outcomes,
      created,
      materialized,
      renderer,
      now,
      isCancelled: () => session.isClosed,
    });

    // A signal handler may have torn the workspace down mid-loop.
    if (shouldReconcile(policy) && !session.isClosed) {
      onPhase?.("reconciling");
      reconciliation = await reconcileSnapshots({ vcs, handle, created });
    }
  } finally {
    onPhase?.("tearing-down");
    teardown = await session.close({ abandon: materialized });
    clearActiveRun(session);
  }

  onPhase?.("done");
  const termination = deriveTermination(policy);
  return {
    revset,
    strategy,
    operationId,
    outcomes,
    termination,
    exitSignal: deriveExitSignal({
      termination,
      outcomes,
      reconciliation,
      reconcileFailurePolicy,
    }),
    reconciliation,
    teardownFailures: teardown.failures,
    startedAt,
    finishedAt: new Date(now()).toISOString(),
  };
}

interface ChangeLoopInput {
  vcs: VcsClient;
  executor: ProcessExecutor;
  handle: WorkspaceHandle;
  changes: readonly ChangeSummary[];
  command: string;
  policy: PolicyState;
  outcomes: ChangeOutcome[];
  created: CreatedChange[];
  materialized: ChangeId[];
  renderer?: RunProgressRenderer;
  now: () => number;
  isCancelled: () => boolean;
}

async function runChangeLoop(input: ChangeLoopInput): Promise<PolicyState> {
  const { changes, outcomes, created, renderer } = input;
  let policy = input.policy;

  for (const [index, change] of changes.entries()) {
    if (input.isCancelled() || !acceptsMoreChanges(policy)) {
      break;
    }

    renderer?.changeStarted(change, { index, total: changes.length });
    const result = await runChange({
      vcs: input.vcs,
      executor: input.executor,
      handle: input.handle,
      change,
      command: input.command,
      onOutputLine: (stream, line) => renderer?.outputLine(change, stream, line),
      onCreated: (changeId) => input.materialized.push(changeId),
      now: input.now,
    });

    outcomes.push(result.outcome);
    if (result.created !== undefined) {
      created.push({ original: change.changeId, created: result.created });
    }
    renderer?.changeFinished(result.outcome);

    policy = advancePolicy(policy, result.outcome);
  }

  return policy;
}

async function readCurrentOperation(
  vcs: VcsClient,
  root: string,
): Promise<string | undefined> {
  try {
    return await vcs.currentOperation(root);
  } catch (error) {
    logWarning(`Failed to read the current operation: ${describeVcsError(error)}`);
    return undefined;
  }
}
