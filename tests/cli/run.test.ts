import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runRunCommand, type RunCommandOptions } from "../../src/cli/run.js";
import {
  EmptyCommandError,
  RepositoryNotFoundError,
} from "../../src/preflight/errors.js";
import { createRunRenderer } from "../../src/render/transcripts/run.js";
import { JjCommandError } from "../../src/vcs/jj.js";
import { createCapturingWriter, stripAnsi } from "../support/ansi.js";
import { failAt, FakeExecutor } from "../support/fakes/executor.js";
import { buildChange, FakeVcsClient } from "../support/fakes/vcs.js";

const CHANGES = [buildChange("c1"), buildChange("c2"), buildChange("c3")];

describe("runRunCommand", () => {
  let repoDir: string;
  let tempDirectory: string;
  let vcs: FakeVcsClient;

  beforeEach(async () => {
    repoDir = await mkdtemp(join(tmpdir(), "jj-run-cli-repo-"));
    tempDirectory = await mkdtemp(join(tmpdir(), "jj-run-cli-tmp-"));
    vcs = new FakeVcsClient();
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(repoDir, { recursive: true, force: true });
    await rm(tempDirectory, { recursive: true, force: true });
  });

  function run(overrides: Partial<RunCommandOptions> = {}) {
    return runRunCommand({
      command: "make fmt",
      cwd: repoDir,
      vcs,
      executor: new FakeExecutor(),
      renderer: createRunRenderer({
        stdout: createCapturingWriter(),
        stderr: createCapturingWriter(),
      }),
      tempDirectory,
      ...overrides,
    });
  }

  it("falls back to the default revset and strategy without a settings file", async () => {
    vcs.revsets.set("mutable() & ::@", []);

    const result = await run();

    expect(result.exitCode).toBe(0);
    expect(result.report.revset).toBe("mutable() & ::@");
    expect(result.report.strategy).toBe("continue");
    expect(stripAnsi(result.body)).toBe(
      [
        "Result: COMPLETED",
        "Revset: mutable() & ::@",
        "Strategy: continue",
        "",
        "No changes processed.",
        "",
        "Rewrote 0 changes.",
      ].join("\n"),
    );
    await expect(readdir(tempDirectory)).resolves.toEqual([]);
  });

  it("reads the revset and strategy from .jj-run.yaml at the repository root", async () => {
    await writeFile(
      join(repoDir, ".jj-run.yaml"),
      "revset: 'trunk()..@'\nerrStrategy: stop\n",
    );
    vcs.revsets.set("trunk()..@", CHANGES);

    const result = await run({ executor: new FakeExecutor(failAt(0)) });

    expect(result.report.revset).toBe("trunk()..@");
    expect(result.report.strategy).toBe("stop");
    expect(result.report.outcomes).toHaveLength(1);
    expect(result.exitCode).toBe(1);
    expect(stripAnsi(result.body).split("\n")[0]).toBe(
      "Result: STOPPED AFTER ERROR",
    );
  });

  it("lets command-line options override the settings file", async () => {
    await writeFile(
      join(repoDir, ".jj-run.yaml"),
      "revset: 'trunk()..@'\nerrStrategy: stop\n",
    );
    vcs.revsets.set("c1 | c2", CHANGES.slice(0, 2));

    const result = await run({
      revset: "c1 | c2",
      errStrategy: "fatal",
      executor: new FakeExecutor(failAt(0, 5)),
    });

    expect(result.report.revset).toBe("c1 | c2");
    expect(result.report.termination).toBe("aborted-fatal");
    expect(result.exitCode).toBe(5);
  });

  it("resolves --config against the working directory", async () => {
    await writeFile(
      join(repoDir, "ci.yaml"),
      "revset: 'all()'\nreconciliation:\n  onFailure: degrade\n",
    );
    vcs.revsets.set("all()", CHANGES.slice(0, 1));
    vcs.failures.set("rewrite c1 from copy-of-c1", new Error("conflict"));

    const result = await run({ configPath: "ci.yaml" });

    expect(result.report.revset).toBe("all()");
    expect(result.report.exitSignal).toBe("degraded");
    expect(result.exitCode).toBe(1);
  });

  it("rejects an empty command before touching the repository", async () => {
    await expect(run({ command: "   " })).rejects.toBeInstanceOf(
      EmptyCommandError,
    );
    expect(vcs.repositoryRoot).not.toHaveBeenCalled();
  });

  it("explains when the directory is not inside a jj repository", async () => {
    vcs.repositoryRoot.mockRejectedValueOnce(
      new JjCommandError(
        ["root"],
        Object.assign(new Error("Command failed"), {
          stderr: "Error: There is no jj repo in \".\"",
        }),
      ),
    );

    const result = run();

    await expect(result).rejects.toBeInstanceOf(RepositoryNotFoundError);
    await expect(result).rejects.toMatchObject({
      headline: `No jj repository found at ${repoDir}.`,
      detailLines: ['Error: There is no jj repo in "."'],
    });
    expect(vcs.createWorkspace).not.toHaveBeenCalled();
  });
});
