import { SECONDS_PER_DAY, type Commit, type NormalizedHistory, type WindowMetrics } from "@collabscope/core";
import { analyzeWindow } from "@collabscope/engine";
import { describe, expect, it } from "vitest";
import {
  SNAPSHOT_SCHEMA_VERSION,
  annotateResult,
  compareSnapshots,
  createReport,
  createSnapshot,
  formatReport,
  parseSnapshot,
  renderChangelogMarkdown,
  serializeSnapshot,
  SnapshotParseError,
  type ResultAnnotator,
} from "./index.js";

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

const history: NormalizedHistory = {
  commits: [
    commit("e1", "alice", days(1), "feat: build core engine", "src/core/a.ts", 800),
    commit("e2", "bob", days(2), "fix: patch core edge case", "src/core/b.ts", 50),
    commit("l1", "bob", days(31), "feat: extend engine api", "src/core/a.ts", 100),
    commit("l2", "carol", days(32), "docs: describe engine api", "docs/guide.md", 20),
  ],
  pullRequests: [
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
  ],
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

const metricsFor = (startDay: number, endDay: number): WindowMetrics => {
  const outcome = analyzeWindow(
    history,
    { startUnix: days(startDay), endUnix: days(endDay) },
    { decayHalfLifeDays: null, inactivityThresholdDays: 45 },
  );
  if (!outcome.ok) {
    throw new Error(outcome.error.message);
  }
  return outcome.value;
};

const earlierSnapshot = createSnapshot({
  metrics: metricsFor(0, 30),
  repository: "acme/widgets",
  generatedAt: "2026-01-01T00:00:00.000Z",
});

const laterSnapshot = createSnapshot({
  metrics: metricsFor(30, 60),
  repository: "acme/widgets",
  generatedAt: "2026-02-01T00:00:00.000Z",
});

describe("snapshots", () => {
  it("round-trips through serialization", () => {
    expect(parseSnapshot(serializeSnapshot(earlierSnapshot))).toEqual(earlierSnapshot);
  });

  it("rejects malformed json", () => {
    expect(() => parseSnapshot("{")).toThrowError(SnapshotParseError);
    try {
      parseSnapshot("{");
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotParseError);
      if (error instanceof SnapshotParseError) {
        expect(error.reason).toBe("invalid_json");
      }
    }
  });

  it("rejects an unknown schema version", () => {
    expect(() => parseSnapshot(JSON.stringify({ schemaVersion: "other.v9" }))).toThrowError(
      "unsupported_snapshot_schema",
    );
  });

  it("rejects a snapshot missing its metrics", () => {
    expect(() => parseSnapshot(JSON.stringify({ schemaVersion: SNAPSHOT_SCHEMA_VERSION }))).toThrowError(
      /^invalid_snapshot: generatedAt: Required$/,
    );
  });
});

describe("compareSnapshots", () => {
  it("diffs the baseline against the current snapshot", () => {
    const diff = compareSnapshots(laterSnapshot, earlierSnapshot);

    expect(diff.baselineWindow).toEqual({ startUnix: 0, endUnix: days(30) });
    expect(diff.currentWindow).toEqual({ startUnix: days(30), endUnix: days(60) });
    expect(diff.metrics.contributors).toEqual({ added: ["carol"], removed: ["alice"] });
  });
});

describe("reports", () => {
  it("summarizes the riskiest folder and the mitigation plan", () => {
    const report = createReport(earlierSnapshot);

    expect(report.repository).toEqual({
      name: "acme/widgets",
      window: { startUnix: 0, endUnix: days(30) },
      riskLevel: "critical",
      primaryRisk: { folder: "src/core", busFactor: 1, totalWeight: 850, riskSet: ["alice"] },
      repositoryBusFactor: 1,
    });
    expect(report.silos).toEqual([{ folder: "src/core", ownerId: "alice", share: 0.9412 }]);
    expect(report.actions).toEqual([
      { priority: 1, folder: "src/core", ownerId: "alice", partnerId: "bob", action: "pair_with_next_owner" },
    ]);
    expect(report.changelog.categories).toEqual([
      { category: "feat", entries: 1 },
      { category: "fix", entries: 1 },
    ]);
  });

  it("renders text with the summary lines", () => {
    const lines = formatReport(createReport(earlierSnapshot), "text").split("\n");

    expect(lines).toContain("  window: 1970-01-01T00:00:00.000Z .. 1970-01-31T00:00:00.000Z");
    expect(lines).toContain("  riskLevel: critical");
    expect(lines).toContain("  primaryRisk: src/core (busFactor=1, owners=alice)");
    expect(lines).toContain("  1. src/core: pair_with_next_owner owner=alice partner=bob");
    expect(lines).toContain("  silos: src/core (alice 0.9412)");
    expect(lines).not.toContain("Diff");
  });

  it("renders the diff section when a baseline is given", () => {
    const report = createReport(laterSnapshot, compareSnapshots(laterSnapshot, earlierSnapshot));
    const lines = formatReport(report, "text").split("\n");

    const diffLines = lines.slice(lines.indexOf("Diff"));
    expect(diffLines[1]).toBe("  baseline: 1970-01-01T00:00:00.000Z .. 1970-01-31T00:00:00.000Z");
    expect(diffLines).toContain("  pending_reviews: 0 -> 1 (+1)");
    expect(diffLines).toContain("  busFactor docs: n/a -> 1");
    expect(diffLines).toContain("  contributors: +[carol] -[alice]");
    expect(diffLines.some((line) => line.startsWith("  commits: "))).toBe(false);
  });

  it("renders markdown headings and tables", () => {
    const lines = formatReport(createReport(earlierSnapshot), "md").split("\n");

    expect(lines[0]).toBe("# Collaboration Risk Report");
    expect(lines).toContain("| `src/core` | 1 | 850 | alice |");
    expect(lines).toContain("1. `src/core`: pair_with_next_owner for `alice` with `bob`");
  });

  it("renders json that parses back into the report", () => {
    const report = createReport(earlierSnapshot);

    expect(JSON.parse(formatReport(report, "json"))).toEqual(JSON.parse(JSON.stringify(report)));
  });
});

describe("renderChangelogMarkdown", () => {
  it("groups entries under category headings", () => {
    expect(renderChangelogMarkdown(earlierSnapshot.metrics.changelog, "Release notes")).toBe(
      [
        "# Release notes",
        "",
        "## Features",
        "",
        "- build core engine (#1, @alice)",
        "",
        "## Bug Fixes",
        "",
        "- patch core edge case (e2, @bob)",
      ].join("\n"),
    );
  });

  it("marks scope and breaking changes", () => {
    const markdown = renderChangelogMarkdown({
      entryCount: 1,
      groups: [
        {
          category: "feat",
          entries: [
            {
              category: "feat",
              scope: "api",
              breaking: true,
              description: "drop v1 routes",
              authorId: "dana",
              reference: "#7",
              source: "pull_request",
              timestampUnix: 0,
            },
          ],
        },
      ],
    });

    expect(markdown.split("\n").at(-1)).toBe("- **BREAKING** **api:** drop v1 routes (#7, @dana)");
  });

  it("notes an empty window", () => {
    expect(renderChangelogMarkdown({ groups: [], entryCount: 0 })).toBe(
      "# Changelog\n\n_No changes in this window._",
    );
  });
});

describe("annotateResult", () => {
  it("attaches commentary from the annotator", async () => {
    const annotator: ResultAnnotator = { annotate: async (subject) => `notes on ${subject}` };

    await expect(annotateResult(annotator, "bus factor", { value: 1 })).resolves.toEqual({
      subject: "bus factor",
      result: { value: 1 },
      commentary: "notes on bus factor",
      annotatorError: null,
    });
  });

  it("keeps the result when the annotator fails", async () => {
    const annotator: ResultAnnotator = {
      annotate: async () => {
        throw new Error("annotator offline");
      },
    };

    await expect(annotateResult(annotator, "bus factor", { value: 1 })).resolves.toEqual({
      subject: "bus factor",
      result: { value: 1 },
      commentary: null,
      annotatorError: "annotator offline",
    });
  });
});
