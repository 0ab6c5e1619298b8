import { SECONDS_PER_DAY, type Commit, type NormalizedHistory, type PullRequest } from "@collabscope/core";
import { describe, expect, it } from "vitest";
import type { AnalysisProgressEvent } from "./run-analysis.js";
import { analyzeWindow, computeStaleBranches } from "./analyze-window.js";
import { compareWindows } from "./compare-windows.js";
import { diffWindowMetrics } from "../domain/window-diff.js";
import { simulateKeyScenariosFor, simulateWhatIf } from "./simulate-what-if.js";

const days = (value: number): number => value * SECONDS_PER_DAY;

const commit = (sha: string, authorId: string, at: number, subject: string, filePath: string, lines: number): Commit => ({
  sha,
  authorId,
  authorName: authorId,
  committedAtUnix: at,
  subject,
  fileChanges: [{ filePath, additions: lines, deletions: 0 }],
  additions: lines,
  deletions: 0,
});

const pullRequests: PullRequest[] = [
  {
    number: 1,
    title: "feat: build core engine",
    authorId: "alice",
    state: "merged",
    createdAtUnix: days(0.5),
    mergedAtUnix: days(3),
    closedAtUnix: days(3),
    commitShas: ["e1"],
    reviews: [{ reviewerId: "bob", submittedAtUnix: days(1), verdict: "approved" }],
  },
  {
    number: 2,
    title: "docs: describe engine api",
    authorId: "carol",
    state: "open",
    createdAtUnix: days(31),
    mergedAtUnix: null,
    closedAtUnix: null,
    commitShas: [],
    reviews: [],
  },
];

const history: NormalizedHistory = {
  commits: [
    commit("e1", "alice", days(1), "feat: build core engine", "src/core/a.ts", 800),
    commit("e2", "bob", days(2), "fix: patch core edge case", "src/core/b.ts", 50),
    commit("l1", "bob", days(31), "feat: extend engine api", "src/core/a.ts", 100),
    commit("l2", "carol", days(32), "docs: describe engine api", "docs/guide.md", 20),
  ],
  pullRequests,
  issues: [],
  branches: [
    { name: "feature/old", headSha: "f1", lastActivityAtUnix: days(0.5), aheadBy: 2, behindBy: 0, merged: false },
  ],
  defaultBranch: { name: "main", headSha: "m1" },
  completeness: "complete",
  skipped: { commits: 0, pullRequests: 0, issues: 0, branches: 0, reviews: 0, total: 0 },
  filtered: 0,
  malformed: [],
};

const earlier = { startUnix: 0, endUnix: days(30) };
const later = { startUnix: days(30), endUnix: days(60) };
const options = { decayHalfLifeDays: null, inactivityThresholdDays: 45 };

describe("analyzeWindow", () => {
  it("computes every metric for the window", () => {
    const outcome = analyzeWindow(history, earlier, options);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }

    expect(outcome.empty).toBe(false);
    expect(outcome.window).toEqual(earlier);
    expect(outcome.value.busFactor.primaryRisk).toEqual({ folder: "src/core", busFactor: 1, totalWeight: 850 });
    expect(outcome.value.contributors.totals).toMatchObject({ contributors: 2, commits: 2 });
    expect(outcome.value.reviewCulture).toMatchObject({ pullRequestsInScope: 1, medianHoursToFirstReview: 12 });
    expect(outcome.value.mitigation.riskLevel).toBe("critical");
    expect(outcome.value.changelog.entryCount).toBe(2);
  });

  it("returns degenerate values for a window without activity", () => {
    const outcome = analyzeWindow(history, { startUnix: days(100), endUnix: days(110) }, options);

    expect(outcome).toMatchObject({ ok: true, empty: true });
    if (outcome.ok) {
      expect(outcome.value.busFactor.primaryRisk).toBeNull();
      expect(outcome.value.branches.counts).toEqual({ merged: 0, orphan: 0, abandoned: 1, wip: 0 });
    }
  });

  it("rejects invalid options before doing any work", () => {
    const events: AnalysisProgressEvent[] = [];
    const outcome = analyzeWindow(history, earlier, { coverageThreshold: 2 }, { onProgress: (event) => events.push(event) });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("invalid_configuration");
    }
    expect(events).toEqual([]);
  });

  it("rejects an empty window", () => {
    expect(analyzeWindow(history, { startUnix: 10, endUnix: 10 })).toEqual({
      ok: false,
      error: {
        kind: "invalid_configuration",
        message: "invalid analysis configuration: window: start must be before end",
        issues: ["window: start must be before end"],
      },
    });
  });

  it("reports cancellation instead of a partial result", () => {
    const controller = new AbortController();
    const outcome = analyzeWindow(history, earlier, options, {
      signal: controller.signal,
      onProgress: (event) => {
        if (event.stage === "commits_processed" && event.processedCommits === 1) {
          controller.abort();
        }
      },
    });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: "cancelled", message: "analysis cancelled after 1 commits", processedCommits: 1 },
    });
  });
});

describe("computeStaleBranches", () => {
  it("classifies a diverged branch idle past the threshold as abandoned", () => {
    const window = { startUnix: 0, endUnix: days(200) };
    const outcome = computeStaleBranches(
      {
        ...history,
        branches: [
          { name: "feature/x", headSha: "x1", lastActivityAtUnix: days(110), aheadBy: 3, behindBy: 0, merged: false },
        ],
      },
      window,
      { inactivityThresholdDays: 60 },
    );

    expect(outcome).toMatchObject({
      ok: true,
      value: { branches: [{ name: "feature/x", category: "abandoned", daysInactive: 90 }] },
    });
  });
});

describe("compareWindows", () => {
  it("diffs the earlier window against the later one", () => {
    const outcome = compareWindows(history, earlier, later, options);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) {
      return;
    }

    const { diff } = outcome.value;
    expect(diff.contributors).toEqual({ added: ["carol"], removed: ["alice"] });
    expect(diff.folders).toEqual({ added: ["docs"], removed: [] });
    expect(diff.staleBranches).toEqual({ added: ["feature/old"], removed: [] });
    expect(diff.contributorCommits).toEqual([
      { metric: "alice", before: 1, after: 0, delta: -1 },
      { metric: "bob", before: 1, after: 1, delta: 0 },
      { metric: "carol", before: 0, after: 1, delta: 1 },
    ]);
    expect(diff.folderBusFactors).toEqual([
      { metric: "docs", before: null, after: 1, delta: null },
      { metric: "src/core", before: 1, after: 1, delta: 0 },
    ]);
    expect(diff.numeric.find((entry) => entry.metric === "pending_reviews")).toEqual({
      metric: "pending_reviews",
      before: 0,
      after: 1,
      delta: 1,
    });
    expect(diff.numeric.find((entry) => entry.metric === "mean_hours_to_first_review")).toEqual({
      metric: "mean_hours_to_first_review",
      before: 12,
      after: null,
      delta: null,
    });
  });

  it("negates every delta when the windows are swapped", () => {
    const outcome = compareWindows(history, earlier, later, options);
    if (!outcome.ok) {
      throw new Error(outcome.error.message);
    }

    const forward = outcome.value.diff;
    const backward = diffWindowMetrics(outcome.value.later, outcome.value.earlier);
    const negate = (value: number | null): number | null => (value === null || value === 0 ? value : -value);

    expect(backward.numeric.map((entry) => entry.delta)).toEqual(forward.numeric.map((entry) => negate(entry.delta)));
    expect(backward.contributorCommits.map((entry) => entry.delta)).toEqual(
      forward.contributorCommits.map((entry) => negate(entry.delta)),
    );
    expect(backward.contributors).toEqual({ added: forward.contributors.removed, removed: forward.contributors.added });
    expect(backward.staleBranches).toEqual({
      added: forward.staleBranches.removed,
      removed: forward.staleBranches.added,
    });
  });

  it("gives identical results on repeated runs", () => {
    expect(compareWindows(history, earlier, later, options)).toEqual(compareWindows(history, earlier, later, options));
  });

  it("rejects overlapping windows", () => {
    const outcome = compareWindows(history, { startUnix: 0, endUnix: days(40) }, later, options);

    expect(outcome).toMatchObject({
      ok: false,
      error: {
        kind: "invalid_configuration",
        issues: ["windows must not overlap: earlier must end before later starts"],
      },
    });
  });
});

describe("simulateWhatIf", () => {
  it("recomputes bus factors without the removed contributor", () => {
    const outcome = simulateWhatIf(history, earlier, ["alice"], options);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.after.folders).toEqual([
        {
          folder: "src/core",
          status: "defined",
          busFactor: 1,
          totalWeight: 50,
          riskSet: [{ contributorId: "bob", weight: 50, share: 1 }],
          owners: [{ contributorId: "bob", weight: 50, share: 1 }],
        },
      ]);
    }
  });

  it("lists the files only the removed contributor touched in the window", () => {
    const outcome = simulateWhatIf(history, earlier, ["alice"], options);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.orphanedFiles).toEqual(["src/core/a.ts"]);
      expect(outcome.value.affectedAreas).toEqual(["src/core"]);
    }
  });
});

describe("simulateKeyScenariosFor", () => {
  it("simulates each owner's removal and each folder's deprecation", () => {
    const outcome = simulateKeyScenariosFor(history, earlier, options);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.empty).toBe(false);
      expect(outcome.value.removals.map((scenario) => [scenario.removed, scenario.orphanedFiles])).toEqual([
        [["alice"], ["src/core/a.ts"]],
        [["bob"], ["src/core/b.ts"]],
      ]);
      expect(outcome.value.deprecations.map((scenario) => scenario.folder)).toEqual(["src/core"]);
    }
  });

  it("is empty for a window without commits", () => {
    const outcome = simulateKeyScenariosFor(history, { startUnix: days(100), endUnix: days(120) }, options);

    expect(outcome).toMatchObject({ ok: true, empty: true, value: { removals: [], deprecations: [] } });
  });
});
