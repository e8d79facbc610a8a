import { logWarning } from "../../utils/output.js";
import { describeVcsError } from "../../vcs/jj.js";
import type { ChangeId, VcsClient } from "../../vcs/types.js";
import type { WorkspaceHandle } from "../../workspace/session.js";
import { ReconciliationFailure } from "./errors.js";
import type { CreatedChange, ReconciliationSummary } from "./types.js";

export interface ReconcileSnapshotsInput {
  vcs: VcsClient;
  handle: WorkspaceHandle;
  created: readonly CreatedChange[];
}

export const SKIPPED_RECONCILIATION: ReconciliationSummary = {
  status: "skipped",
  rewritten: [],
  unchanged: [],
  failures: [],
};

/**
 * Carries the content of each created copy back onto its original change,
 * in processing order. Failed rewrites are logged and collected; they never
 * fail the run.
 */
export async function reconcileSnapshots(
  input: ReconcileSnapshotsInput,
): Promise<ReconciliationSummary> {
  const { vcs, handle, created } = input;
  const rewritten: ChangeId[] = [];
  const unchanged: ChangeId[] = [];
  const failures: ReconciliationFailure[] = [];

  for (const pair of created) {
    try {
      const result = await vcs.rewriteParentSnapshot({
        cwd: handle.path,
        original: pair.original,
        created: pair.created,
      });
      if (result === "rewritten") {
        rewritten.push(pair.original);
      } else {
        unchanged.push(pair.original);
      }
    } catch (error) {
      const failure = new ReconciliationFailure(
        pair.original,
        pair.created,
        describeVcsError(error),
      );
      failures.push(failure);
      logWarning(failure.messageForDisplay());
    }
  }

  if (rewritten.length > 0) {
    await refreshStaleWorkspaces(vcs, handle);
  }

  return { status: "completed", rewritten, unchanged, failures };
}

async function refreshStaleWorkspaces(
  vcs: VcsClient,
  handle: WorkspaceHandle,
): Promise<void> {
  for (const cwd of [handle.repositoryRoot, handle.path]) {
    try {
      await vcs.updateStaleWorkspace(cwd);
    } catch (error) {
      logWarning(
        `Failed to update stale workspace at ${cwd}: ${describeVcsError(error)}`,
      );
    }
  }
}
