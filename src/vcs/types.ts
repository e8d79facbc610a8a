export type ChangeId = string;

export interface ChangeSummary {
  readonly changeId: ChangeId;
  readonly commitId: string;
  /** First line of the description; empty when none is set. */
  readonly description: string;
  readonly parents: readonly string[];
  readonly immutable: boolean;
  readonly empty: boolean;
}

export interface ListChangesOptions {
  cwd: string;
}

export interface CreateWorkspaceOptions {
  root: string;
  path: string;
  name: string;
}

export interface ForgetWorkspaceOptions {
  root: string;
  name: string;
}

export interface NewChangeOptions {
  /** Workspace directory the new working-copy change is created in. */
  cwd: string;
  parent: ChangeId;
}

export interface AbandonChangeOptions {
  root: string;
  changeId: ChangeId;
}

export interface RewriteParentSnapshotOptions {
  cwd: string;
  original: ChangeId;
  created: ChangeId;
}

export type RewriteResult = "rewritten" | "unchanged";

/**
 * The slice of version-control behaviour a run depends on. Every operation
 * receives the directory it acts in; nothing reads the process cwd.
 */
export interface VcsClient {
  repositoryRoot(cwd: string): Promise<string>;
  currentOperation(root: string): Promise<string>;
  listChanges(
    revset: string,
    options: ListChangesOptions,
  ): Promise<ChangeSummary[]>;
  createWorkspace(options: CreateWorkspaceOptions): Promise<string>;
  forgetWorkspace(options: ForgetWorkspaceOptions): Promise<void>;
  newChange(options: NewChangeOptions): Promise<ChangeId>;
  /** Records the working copy of `cwd` and returns its change. */
  snapshot(cwd: string): Promise<ChangeSummary>;
  abandon(options: AbandonChangeOptions): Promise<void>;
  rewriteParentSnapshot(
    options: RewriteParentSnapshotOptions,
  ): Promise<RewriteResult>;
  updateStaleWorkspace(cwd: string): Promise<void>;
}
