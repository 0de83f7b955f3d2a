import { describe, it, expect } from "vitest";
import { isDirty, listRemoteBranches, redactUrl } from "./git.js";
import { createFakeGit } from "./test-utils.js";

describe("redactUrl", () => {
  it("hides credentials in remote URLs", () => {
    expect(redactUrl("git remote add origin https://test-secret@github.com/acme/widgets.git")).toBe(
      "git remote add origin https://***@github.com/acme/widgets.git"
    );
  });

  it("leaves URLs without credentials alone", () => {
    expect(redactUrl("https://github.com/acme/widgets.git")).toBe("https://github.com/acme/widgets.git");
  });
});

describe("listRemoteBranches", () => {
  it("drops the HEAD alias and bare remote names", async () => {
    const { git } = createFakeGit(() => ({ stdout: "origin\norigin/HEAD\norigin/main\norigin/feature\n\n", stderr: "" }));

    await expect(listRemoteBranches(git, "/repo")).resolves.toEqual(["origin/main", "origin/feature"]);
  });
});

describe("isDirty", () => {
  it("is true when porcelain status has entries", async () => {
    const { git } = createFakeGit(() => ({ stdout: " M a.ts\n", stderr: "" }));

    await expect(isDirty(git, "/repo")).resolves.toBe(true);
  });

  it("is false for a clean tree", async () => {
    const { git } = createFakeGit();

    await expect(isDirty(git, "/repo")).resolves.toBe(false);
  });
});
