import { describe, expect, it } from "vitest";
import { describeGitFailure } from "./git-command-client.js";

describe("describeGitFailure", () => {
  it("prefers the first line git wrote to stderr", () => {
    const failure = Object.assign(new Error("Command failed: git -C /tmp log"), {
      stderr: "\nfatal: not a git repository (or any of the parent directories): .git\nhint: run git init\n",
    });

    expect(describeGitFailure(failure)).toBe("fatal: not a git repository (or any of the parent directories): .git");
  });

  it("falls back to the error message when stderr is empty", () => {
    const failure = Object.assign(new Error("spawn git ENOENT"), { stderr: "" });

    expect(describeGitFailure(failure)).toBe("spawn git ENOENT");
  });

  it("describes values that are not errors", () => {
    expect(describeGitFailure("boom")).toBe("unknown git execution error");
  });
});
