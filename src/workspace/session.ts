import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import {
  SessionInitError,
  TeardownFailure,
  type TeardownStep,
} from "../commands/run/errors.js";
import { toErrorMessage } from "../utils/errors.js";
import { logWarning } from "../utils/output.js";
import { describeVcsError } from "../vcs/jj.js";
import type { ChangeId, VcsClient } from "../vcs/types.js";

export const WORKSPACE_DIR_PREFIX = "jj-run-" as const;

export interface WorkspaceHandle {
  /** Root of the workspace the user invoked the run from. */
  readonly repositoryRoot: string;
  /** Temporary directory that contains the workspace checkout. */
  readonly tempRoot: string;
  readonly path: string;
  readonly name: string;
  /** Change checked out by `jj workspace add`; never a run target. */
  readonly workingCopyChangeId: ChangeId;
}

export interface WorkspaceSessionOptions {
  root: string;
  vcs: VcsClient;
  tempDirectory?: string;
}

export interface CloseWorkspaceSessionOptions {
  abandon?: readonly ChangeId[];
}

export interface TeardownReport {
  readonly failures: readonly TeardownFailure[];
}

type SessionPhase = "idle" | "opening" | "open" | "closed";

/**
 * Owns one temporary jj workspace. `close` releases whatever `open` managed
 * to acquire, so it must be called even when `open` throws.
 */
export class WorkspaceSession {
  private readonly root: string;
  private readonly vcs: VcsClient;
  private readonly tempDirectory: string;

  private phase: SessionPhase = "idle";
  private tempRoot: string | undefined;
  private workspaceName: string | undefined;
  private workingCopyChangeId: ChangeId | undefined;
  private handle: WorkspaceHandle | undefined;
  private closing: Promise<TeardownReport> | undefined;

  constructor(options: WorkspaceSessionOptions) {
    this.root = options.root;
    this.vcs = options.vcs;
    this.tempDirectory = options.tempDirectory ?? tmpdir();
  }

  public get current(): WorkspaceHandle | undefined {
    return this.handle;
  }

  public get isClosed(): boolean {
    return this.phase === "closed";
  }

  public async open(): Promise<WorkspaceHandle> {
    if (this.phase !== "idle") {
      throw new SessionInitError(`session is already ${this.phase}`);
    }
    this.phase = "opening";

    let tempRoot: string;
    try {
      tempRoot = await mkdtemp(join(this.tempDirectory, WORKSPACE_DIR_PREFIX));
    } catch (error) {
      throw new SessionInitError(
        `cannot create a temporary directory: ${toErrorMessage(error)}`,
        { cause: error },
      );
    }
    this.tempRoot = tempRoot;

    const name = basename(tempRoot);
    const path = join(tempRoot, name);

    let workingCopyChangeId: ChangeId;
    try {
      await this.vcs.createWorkspace({ root: this.root, path, name });
      this.workspaceName = name;
      const current = await this.vcs.snapshot(path);
      workingCopyChangeId = current.changeId;
    } catch (error) {
      throw new SessionInitError(
        `cannot register workspace ${name}: ${describeVcsError(error)}`,
        { cause: error },
      );
    }
    this.workingCopyChangeId = workingCopyChangeId;

    this.handle = {
      repositoryRoot: this.root,
      tempRoot,
      path,
      name,
      workingCopyChangeId,
    };
    this.phase = "open";
    return this.handle;
  }

  /**
   * Forgets the workspace, abandons the given changes together with the
   * workspace's own working-copy change and removes the temporary directory.
   * Each step runs even when an earlier one failed. Never throws; repeated
   * calls return the first teardown's report.
   */
  public async close(
    options: CloseWorkspaceSessionOptions = {},
  ): Promise<TeardownReport> {
    if (!this.closing) {
      this.closing = this.teardown(options.abandon ?? []);
    }
    return await this.closing;
  }

  private async teardown(abandon: readonly ChangeId[]): Promise<TeardownReport> {
    this.phase = "closed";
    this.handle = undefined;
    const failures: TeardownFailure[] = [];

    const attempt = async (
      step: TeardownStep,
      action: () => Promise<void>,
    ): Promise<void> => {
      try {
        await action();
      } catch (error) {
        const failure = new TeardownFailure(step, describeVcsError(error));
        failures.push(failure);
        logWarning(failure.messageForDisplay());
      }
    };

    const workspaceName = this.workspaceName;
    if (workspaceName !== undefined) {
      await attempt("forget-workspace", () =>
        this.vcs.forgetWorkspace({ root: this.root, name: workspaceName }),
      );
    }

    const changeIds = uniqueChangeIds([
      ...abandon,
      ...(this.workingCopyChangeId !== undefined ? [this.workingCopyChangeId] : []),
    ]);
    for (const changeId of changeIds) {
      await attempt("abandon-change", () =>
        this.vcs.abandon({ root: this.root, changeId }),
      );
    }

    const tempRoot = this.tempRoot;
    if (tempRoot !== undefined) {
      await attempt("remove-directory", () =>
        rm(tempRoot, { recursive: true, force: true }),
      );
    }

    return { failures };
  }
}

function uniqueChangeIds(changeIds: readonly ChangeId[]): ChangeId[] {
  return Array.from(new Set(changeIds));
}
