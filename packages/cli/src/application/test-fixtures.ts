import { SECONDS_PER_DAY, type Commit, type NormalizedHistory } from "@collabscope/core";
import type { Logger } from "./logger.js";

export const days = (value: number): number => value * SECONDS_PER_DAY;

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

export const history: NormalizedHistory = {
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
  ],
  issues: [],
  branches: [],
  defaultBranch: { name: "main", headSha: "m1" },
  completeness: "complete",
  skipped: { commits: 0, pullRequests: 0, issues: 0, branches: 0, reviews: 0, total: 0 },
  filtered: 0,
  malformed: [],
};

export const earlier = { startUnix: 0, endUnix: days(30) };
export const later = { startUnix: days(30), endUnix: days(60) };
export const overrides = { decayHalfLifeDays: null, inactivityThresholdDays: 45 };

export type RecordedLog = { level: keyof Logger; message: string };

export const createRecordingLogger = (): { logger: Logger; entries: RecordedLog[] } => {
  const entries: RecordedLog[] = [];
  const record =
    (level: keyof Logger) =>
    (message: string): void => {
      entries.push({ level, message });
    };

  return {
    entries,
    logger: { error: record("error"), warn: record("warn"), info: record("info"), debug: record("debug") },
  };
};
