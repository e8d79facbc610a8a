import {
  ImmutableChangesError,
  RevsetError,
} from "../../../src/commands/run/errors.js";
import { resolveRevset } from "../../../src/commands/run/resolver.js";
import {
  buildChange,
  buildHandle,
  FakeVcsClient,
  ROOT_CHANGE_ID,
  WORKSPACE_CHANGE_ID,
} from "../../support/fakes/vcs.js";

describe("resolveRevset", () => {
  let vcs: FakeVcsClient;

  beforeEach(() => {
    vcs = new FakeVcsClient();
  });

  it("evaluates the revset from the invoking workspace and keeps jj's order", async () => {
    vcs.revsets.set("mutable()", [buildChange("c2"), buildChange("c1")]);

    const changes = await resolveRevset({
      vcs,
      handle: buildHandle(),
      revset: "mutable()",
    });

    expect(changes.map((change) => change.changeId)).toEqual(["c2", "c1"]);
    expect(vcs.listChanges).toHaveBeenCalledWith("mutable()", { cwd: "/repo" });
  });

  it("drops the session working copy, the root change and duplicates", async () => {
    vcs.revsets.set("all()", [
      buildChange("c1"),
      buildChange(WORKSPACE_CHANGE_ID),
      buildChange("c1"),
      buildChange(ROOT_CHANGE_ID, { immutable: true }),
    ]);

    const changes = await resolveRevset({
      vcs,
      handle: buildHandle(),
      revset: "all()",
    });

    expect(changes.map((change) => change.changeId)).toEqual(["c1"]);
  });

  it("returns an empty list for an empty revset", async () => {
    vcs.revsets.set("none()", []);

    await expect(
      resolveRevset({ vcs, handle: buildHandle(), revset: "none()" }),
    ).resolves.toEqual([]);
  });

  it("lists every immutable change in one error", async () => {
    vcs.revsets.set("::@", [
      buildChange("c1"),
      buildChange("t1", { immutable: true }),
      buildChange("t2", { immutable: true }),
    ]);

    const error = await resolveRevset({
      vcs,
      handle: buildHandle(),
      revset: "::@",
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ImmutableChangesError);
    expect(error).toMatchObject({
      headline: "Revset `::@` contains immutable changes.",
      detailLines: ["  - t1", "  - t2"],
      changeIds: ["t1", "t2"],
    });
  });

  it("wraps evaluation failures in a revset error", async () => {
    const error = await resolveRevset({
      vcs,
      handle: buildHandle(),
      revset: "nope(",
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RevsetError);
    expect(error).not.toBeInstanceOf(ImmutableChangesError);
    expect(error).toMatchObject({
      revset: "nope(",
      headline: "Cannot evaluate revset `nope(`.",
      detailLines: ["Failed to parse revset: nope("],
    });
  });

  it("names the root lookup when it is the step that fails", async () => {
    vcs.revsets.set("mutable()", [buildChange("c1")]);
    vcs.failures.set("log root()", new Error("repository is locked"));

    const error = await resolveRevset({
      vcs,
      handle: buildHandle(),
      revset: "mutable()",
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RevsetError);
    expect(error).toMatchObject({
      revset: "mutable()",
      headline: "Cannot look up the repository root change.",
      detailLines: ["repository is locked"],
    });
  });
});
