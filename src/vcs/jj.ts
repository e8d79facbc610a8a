import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { HintedError, toErrorMessage } from "../utils/errors.js";
import type {
  AbandonChangeOptions,
  ChangeId,
  ChangeSummary,
  CreateWorkspaceOptions,
  ForgetWorkspaceOptions,
  ListChangesOptions,
  NewChangeOptions,
  RewriteParentSnapshotOptions,
  RewriteResult,
  VcsClient,
} from "./types.js";

const execFileAsync = promisify(execFile);

const JJ_BINARY = "jj" as const;
const FIELD_SEPARATOR = "\t";

/**
 * One line per change. The description goes last so tabs inside it survive
 * the split.
 */
export const CHANGE_LOG_TEMPLATE = [
  "change_id",
  "commit_id",
  'if(immutable, "1", "0")',
  'if(empty, "1", "0")',
  'parents.map(|p| p.commit_id()).join(",")',
  "description.first_line()",
].join(' ++ "\\t" ++ ') + ' ++ "\\n"';

export interface JjCommandOptions {
  cwd: string;
  trim?: boolean;
}

export type JjCommandRunner = (
  args: readonly string[],
  options: JjCommandOptions,
) => Promise<string>;

export class JjCommandError extends HintedError {
  public readonly args: readonly string[];
  public readonly exitCode: number | string | undefined;
  public readonly stderr: string | undefined;

  constructor(args: readonly string[], cause: unknown) {
    const stderr = getJjStderr(cause);
    super(`jj ${args.join(" ")} failed`, {
      detailLines: stderr ? stderr.split("\n") : [],
      cause,
    });
    this.name = "JjCommandError";
    this.args = Array.from(args);
    this.exitCode = readExitCode(cause);
    this.stderr = stderr;
  }

  /** Stderr of the failed invocation, or the headline when jj printed none. */
  public get detail(): string {
    return this.stderr ?? this.headline;
  }
}

export async function runJjCommand(
  args: readonly string[],
  options: JjCommandOptions,
): Promise<string> {
  const { cwd, trim = true } = options;
  try {
    const { stdout } = await execFileAsync(
      JJ_BINARY,
      ["--color", "never", "--no-pager", ...args],
      {
        cwd,
        encoding: "utf8",
        maxBuffer: 10 * 1024 * 1024,
      },
    );
    return trim ? stdout.trim() : stdout;
  } catch (error) {
    throw new JjCommandError(args, error);
  }
}

export function getJjStderr(error: unknown): string | undefined {
  if (
    error &&
    typeof error === "object" &&
    "stderr" in error &&
    typeof error.stderr === "string"
  ) {
    const stderr = error.stderr.trim();
    if (stderr.length > 0) {
      return stderr;
    }
  }

  return undefined;
}

function readExitCode(error: unknown): number | string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    if (typeof code === "number" || typeof code === "string") {
      return code;
    }
  }
  return undefined;
}

export function describeVcsError(error: unknown): string {
  if (error instanceof JjCommandError) {
    return error.detail;
  }
  return toErrorMessage(error);
}

export function parseChangeLog(output: string): ChangeSummary[] {
  const changes: ChangeSummary[] = [];

  for (const line of output.split("\n")) {
    if (line.trim().length === 0) {
      continue;
    }

    const [changeId, commitId, immutable, empty, parents, ...rest] =
      line.split(FIELD_SEPARATOR);
    if (
      !changeId ||
      !commitId ||
      immutable === undefined ||
      empty === undefined ||
      parents === undefined
    ) {
      throw new Error(`Unexpected jj log line: ${line}`);
    }

    changes.push({
      changeId,
      commitId,
      immutable: immutable === "1",
      empty: empty === "1",
      parents: parents.length > 0 ? parents.split(",") : [],
      description: rest.join(FIELD_SEPARATOR).trim(),
    });
  }

  return changes;
}

export class JjClient implements VcsClient {
  private readonly run: JjCommandRunner;

  constructor(run: JjCommandRunner = runJjCommand) {
    this.run = run;
  }

  public async repositoryRoot(cwd: string): Promise<string> {
    return await this.run(["root"], { cwd });
  }

  public async currentOperation(root: string): Promise<string> {
    return await this.run(["op", "log", "-n1", "--no-graph", "-T", "id"], {
      cwd: root,
    });
  }

  public async listChanges(
    revset: string,
    options: ListChangesOptions,
  ): Promise<ChangeSummary[]> {
    const output = await this.run(
      ["log", "-r", revset, "--no-graph", "-T", CHANGE_LOG_TEMPLATE],
      { cwd: options.cwd, trim: false },
    );
    return parseChangeLog(output);
  }

  public async createWorkspace(
    options: CreateWorkspaceOptions,
  ): Promise<string> {
    const { root, path, name } = options;
    await this.run(["workspace", "add", "--name", name, path], { cwd: root });
    return name;
  }

  public async forgetWorkspace(options: ForgetWorkspaceOptions): Promise<void> {
    await this.run(["workspace", "forget", options.name], {
      cwd: options.root,
    });
  }

  /**
   * Creates a working-copy change on top of `parent`. Once `jj new` has
   * succeeded the id must not be lost, so a failed read of `@` falls back to
   * diffing the parent's children against those seen beforehand.
   */
  public async newChange(options: NewChangeOptions): Promise<ChangeId> {
    const { cwd, parent } = options;
    const children = `children(${parent})`;
    const existing = new Set(await this.listChangeIds(children, cwd));

    await this.run(["new", parent], { cwd });

    try {
      const current = await this.snapshot(cwd);
      return current.changeId;
    } catch (error) {
      const added = (await this.listChangeIds(children, cwd)).filter(
        (changeId) => !existing.has(changeId),
      );
      const [createdId] = added;
      if (createdId === undefined || added.length > 1) {
        throw error;
      }
      return createdId;
    }
  }

  private async listChangeIds(revset: string, cwd: string): Promise<ChangeId[]> {
    const changes = await this.listChanges(revset, { cwd });
    return changes.map((change) => change.changeId);
  }

  public async snapshot(cwd: string): Promise<ChangeSummary> {
    const [current] = await this.listChanges("@", { cwd });
    if (!current) {
      throw new Error(`No working-copy change found in ${cwd}`);
    }
    return current;
  }

  public async abandon(options: AbandonChangeOptions): Promise<void> {
    await this.run(
      ["abandon", `present(${options.changeId})`, "--ignore-working-copy"],
      { cwd: options.root },
    );
  }

  public async rewriteParentSnapshot(
    options: RewriteParentSnapshotOptions,
  ): Promise<RewriteResult> {
    const { cwd, original, created } = options;
    // Nothing to carry back from an empty or already abandoned copy.
    const [copy] = await this.listChanges(`present(${created})`, { cwd });
    if (!copy || copy.empty) {
      return "unchanged";
    }

    await this.run(["edit", original], { cwd });
    await this.run(
      ["restore", "--from", created, "--restore-descendants"],
      { cwd },
    );
    return "rewritten";
  }

  public async updateStaleWorkspace(cwd: string): Promise<void> {
    await this.run(["workspace", "update-stale"], { cwd });
  }
}
