import { toErrorMessage } from "../../utils/errors.js";
import { logWarning } from "../../utils/output.js";
import { describeVcsError } from "../../vcs/jj.js";
import type { ChangeId, ChangeSummary, VcsClient } from "../../vcs/types.js";
import type { WorkspaceHandle } from "../../workspace/session.js";
import {
  type ChangeFailure,
  ChangeInfrastructureError,
  CommandFailure,
} from "./errors.js";
import type { ProcessExecutor } from "./executor.js";
import { createChangeOutputSink, type OutputLineListener } from "./output-sink.js";
import type { ChangeOutcome } from "./types.js";

export interface RunChangeInput {
  vcs: VcsClient;
  executor: ProcessExecutor;
  handle: WorkspaceHandle;
  change: ChangeSummary;
  command: string;
  onOutputLine?: OutputLineListener;
  /** Called as soon as the copy exists, before the command starts. */
  onCreated?: (created: ChangeId) => void;
  now?: () => number;
}

export interface RunChangeResult {
  outcome: ChangeOutcome;
  /** Set whenever the mutable copy exists, whatever the command did. */
  created?: ChangeId;
}

/**
 * Materializes a mutable copy of `change` inside the session workspace, runs
 * the command there and snapshots the result. Failures are recorded on the
 * outcome, never thrown.
 */
export async function runChange(input: RunChangeInput): Promise<RunChangeResult> {
  const { vcs, executor, handle, change, command } = input;
  const now = input.now ?? Date.now;
  const startedAtMs = now();

  const finish = (
    fields: Pick<ChangeOutcome, "exitStatus" | "stdout" | "stderr"> & {
      createdChangeId?: ChangeId;
      error?: ChangeFailure;
    },
  ): ChangeOutcome => {
    const finishedAtMs = now();
    return {
      changeId: change.changeId,
      description: change.description,
      startedAt: new Date(startedAtMs).toISOString(),
      finishedAt: new Date(finishedAtMs).toISOString(),
      durationMs: Math.max(0, finishedAtMs - startedAtMs),
      ...fields,
    };
  };

  let created: ChangeId;
  try {
    created = await vcs.newChange({ cwd: handle.path, parent: change.changeId });
  } catch (error) {
    return {
      outcome: finish({
        exitStatus: null,
        stdout: "",
        stderr: "",
        error: new ChangeInfrastructureError(
          change.changeId,
          describeVcsError(error),
        ),
      }),
    };
  }
  input.onCreated?.(created);

  const sink = createChangeOutputSink(input.onOutputLine ?? (() => {}));
  let exitStatus: number | null = null;
  let error: ChangeFailure | undefined;

  try {
    const result = await executor.execute({
      command,
      cwd: handle.path,
      stdout: sink.stdout,
      stderr: sink.stderr,
    });
    exitStatus = result.exitCode;
    if (result.exitCode !== 0 || result.signal !== null) {
      error = new CommandFailure({
        changeId: change.changeId,
        exitCode: result.exitCode,
        signal: result.signal,
      });
    }
  } catch (spawnError) {
    error = new CommandFailure({
      changeId: change.changeId,
      detail: `cannot start command: ${toErrorMessage(spawnError)}`,
    });
  } finally {
    await sink.close();
  }

  try {
    await vcs.snapshot(handle.path);
  } catch (snapshotError) {
    const detail = `cannot snapshot working copy: ${describeVcsError(snapshotError)}`;
    if (error) {
      logWarning(`(${change.changeId}) ${detail}`);
    } else {
      error = new ChangeInfrastructureError(change.changeId, detail);
    }
  }

  const { stdout, stderr } = sink.captured();
  return {
    outcome: finish({ createdChangeId: created, exitStatus, stdout, stderr, error }),
    created,
  };
}
