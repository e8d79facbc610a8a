import type { ChangeId } from "../../vcs/types.js";
import type { TeardownReport, WorkspaceSession } from "../../workspace/session.js";

interface ActiveRunContext {
  session: WorkspaceSession;
  /** Returns the copies created so far; read at termination time. */
  createdChanges: () => readonly ChangeId[];
}

let activeRun: ActiveRunContext | undefined;

export function registerActiveRun(context: ActiveRunContext): void {
  activeRun = context;
}

export function clearActiveRun(session: WorkspaceSession): void {
  if (activeRun?.session === session) {
    activeRun = undefined;
  }
}

/**
 * Tears down the workspace of the run in progress, if any. Called from
 * signal and crash handlers; the session guarantees a single teardown even
 * when the run's own cleanup is also under way.
 */
export async function terminateActiveRun(): Promise<TeardownReport | undefined> {
  const context = activeRun;
  if (!context) {
    return undefined;
  }

  activeRun = undefined;
  return await context.session.close({ abandon: context.createdChanges() });
}
