import { AnalysisCancelledError } from "@collabscope/core";
import { describe, expect, it } from "vitest";
import { computeContributorStats } from "./contributor-stats.js";
import { commitAt, historyOf, issue, pullRequest } from "./test-fixtures.js";

const window = { startUnix: 1_000, endUnix: 2_000 };

const history = historyOf({
  commits: [
    commitAt("c1", "alice", 1_100, "feat: first", [
      ["src/core/a.ts", 10, 2],
      ["docs/guide.md", 1, 0],
    ]),
    commitAt("c2", "bob", 1_200, "fix: second", [["lib/z.ts", 5, 5]]),
    commitAt("c3", "alice", 1_300, "feat: third", [["src/core/b.ts", 3, 0]]),
    commitAt("c4", "bob", 2_500, "chore: after the window", [["lib/z.ts", 1, 1]]),
  ],
  pullRequests: [
    pullRequest({ number: 1, authorId: "carol", createdAtUnix: 1_500, mergedAtUnix: 1_600 }),
    pullRequest({ number: 2, authorId: "alice", createdAtUnix: 900, mergedAtUnix: 1_100 }),
  ],
  issues: [
    issue({ number: 1, authorId: "dave", createdAtUnix: 1_100 }),
    issue({ number: 2, authorId: "carol", createdAtUnix: 500, closedAtUnix: 1_500 }),
  ],
});

describe("computeContributorStats", () => {
  it("aggregates in-window activity per contributor", () => {
    const summary = computeContributorStats(history, window, { folderDepth: 2 });

    expect(summary.contributors).toEqual([
      {
        contributorId: "alice",
        commitCount: 2,
        linesAdded: 14,
        linesRemoved: 2,
        pullRequestsOpened: 0,
        pullRequestsMerged: 1,
        issuesOpened: 0,
        issuesClosed: 0,
        foldersTouched: ["docs", "src/core"],
        firstCommitAtUnix: 1_100,
        lastCommitAtUnix: 1_300,
      },
      {
        contributorId: "bob",
        commitCount: 1,
        linesAdded: 5,
        linesRemoved: 5,
        pullRequestsOpened: 0,
        pullRequestsMerged: 0,
        issuesOpened: 0,
        issuesClosed: 0,
        foldersTouched: ["lib"],
        firstCommitAtUnix: 1_200,
        lastCommitAtUnix: 1_200,
      },
      {
        contributorId: "carol",
        commitCount: 0,
        linesAdded: 0,
        linesRemoved: 0,
        pullRequestsOpened: 1,
        pullRequestsMerged: 1,
        issuesOpened: 0,
        issuesClosed: 1,
        foldersTouched: [],
        firstCommitAtUnix: null,
        lastCommitAtUnix: null,
      },
      {
        contributorId: "dave",
        commitCount: 0,
        linesAdded: 0,
        linesRemoved: 0,
        pullRequestsOpened: 0,
        pullRequestsMerged: 0,
        issuesOpened: 1,
        issuesClosed: 0,
        foldersTouched: [],
        firstCommitAtUnix: null,
        lastCommitAtUnix: null,
      },
    ]);
    expect(summary.totals).toEqual({
      contributors: 4,
      commits: 3,
      linesAdded: 19,
      linesRemoved: 7,
      pullRequestsOpened: 1,
      pullRequestsMerged: 2,
      issuesOpened: 1,
      issuesClosed: 1,
    });
  });

  it("rolls folders up to the configured depth", () => {
    const summary = computeContributorStats(history, window, { folderDepth: 1 });

    expect(summary.contributors[0]?.foldersTouched).toEqual(["docs", "src"]);
  });

  it("omits everyone for a window without activity", () => {
    const summary = computeContributorStats(history, { startUnix: 3_000, endUnix: 4_000 }, { folderDepth: 2 });

    expect(summary.contributors).toEqual([]);
    expect(summary.totals.contributors).toBe(0);
  });

  it("throws once cancelled", () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => computeContributorStats(history, window, { folderDepth: 2 }, { signal: controller.signal })).toThrow(
      AnalysisCancelledError,
    );
  });
});
