import { describeVcsError } from "../../vcs/jj.js";
import type { ChangeSummary, VcsClient } from "../../vcs/types.js";
import type { WorkspaceHandle } from "../../workspace/session.js";
import { ImmutableChangesError, RevsetError } from "./errors.js";

export const ROOT_REVSET = "root()" as const;

export interface ResolveRevsetInput {
  vcs: VcsClient;
  handle: WorkspaceHandle;
  revset: string;
}

/**
 * Evaluates `revset` from the invoking workspace and returns the changes to
 * process, in jj's order. The session's own working-copy change and the root
 * change are dropped; an empty result is valid.
 */
export async function resolveRevset(
  input: ResolveRevsetInput,
): Promise<ChangeSummary[]> {
  const { vcs, handle, revset } = input;
  const cwd = handle.repositoryRoot;

  let changes: ChangeSummary[];
  try {
    changes = await vcs.listChanges(revset, { cwd });
  } catch (error) {
    throw new RevsetError(revset, `Cannot evaluate revset \`${revset}\`.`, {
      detailLines: describeVcsError(error).split("\n"),
      cause: error,
    });
  }

  let roots: ChangeSummary[];
  try {
    roots = await vcs.listChanges(ROOT_REVSET, { cwd });
  } catch (error) {
    throw new RevsetError(revset, "Cannot look up the repository root change.", {
      detailLines: describeVcsError(error).split("\n"),
      cause: error,
    });
  }

  const excluded = new Set<string>([
    handle.workingCopyChangeId,
    ...roots.map((root) => root.changeId),
  ]);
  const seen = new Set<string>();
  const eligible: ChangeSummary[] = [];

  for (const change of changes) {
    if (excluded.has(change.changeId) || seen.has(change.changeId)) {
      continue;
    }
    seen.add(change.changeId);
    eligible.push(change);
  }

  const immutable = eligible.filter((change) => change.immutable);
  if (immutable.length > 0) {
    throw new ImmutableChangesError(
      revset,
      immutable.map((change) => change.changeId),
    );
  }

  return eligible;
}
