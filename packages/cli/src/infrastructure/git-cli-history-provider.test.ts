import type { GitHistoryProgressEvent } from "@collabscope/history";
import { describe, expect, it } from "vitest";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { GIT_LOG_ARGS, GitCliHistoryProvider } from "./git-cli-history-provider.js";

const rawLog = [
  "\u001eabc123\u001f1700000000\u001fAlice\u001falice@example.com\u001ffeat: add cache",
  "3\t1\tsrc/a.ts",
  "",
].join("\n");

class FakeGitClient implements GitCommandClient {
  readonly calls: Array<readonly string[]> = [];

  constructor(private readonly respond: (args: readonly string[]) => string) {}

  run(_repositoryPath: string, args: readonly string[]): string {
    this.calls.push(args);
    return this.respond(args);
  }
}

describe("GitCliHistoryProvider", () => {
  it("detects a work tree", () => {
    const provider = new GitCliHistoryProvider(new FakeGitClient(() => "true\n"));

    expect(provider.isGitRepository("/repo")).toBe(true);
  });

  it("treats git's not-a-repository error as false", () => {
    const provider = new GitCliHistoryProvider(
      new FakeGitClient((args) => {
        throw new GitCommandError("fatal: not a git repository (or any parent)", args);
      }),
    );

    expect(provider.isGitRepository("/tmp")).toBe(false);
  });

  it("rethrows other git failures", () => {
    const provider = new GitCliHistoryProvider(
      new FakeGitClient((args) => {
        throw new GitCommandError("git: command not found", args);
      }),
    );

    expect(() => provider.isGitRepository("/repo")).toThrowError(GitCommandError);
  });

  it("reads and parses the commit log", () => {
    const client = new FakeGitClient(() => rawLog);
    const events: GitHistoryProgressEvent[] = [];

    const commits = new GitCliHistoryProvider(client).getCommitHistory("/repo", (event) => events.push(event));

    expect(client.calls).toEqual([GIT_LOG_ARGS]);
    expect(commits.map((commit) => [commit.sha, commit.subject])).toEqual([["abc123", "feat: add cache"]]);
    expect(events[0]).toEqual({ stage: "git_log_received", bytes: Buffer.byteLength(rawLog, "utf8") });
    expect(events.at(-1)).toEqual({ stage: "git_log_parsed", commits: 1 });
  });
});
