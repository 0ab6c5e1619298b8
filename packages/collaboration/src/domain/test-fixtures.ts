import type { Branch, Commit, Issue, NormalizedHistory, PullRequest, Review } from "@collabscope/core";

export const commitAt = (
  sha: string,
  authorId: string,
  committedAtUnix: number,
  subject: string,
  files: ReadonlyArray<readonly [string, number, number]> = [],
): Commit => ({
  sha,
  authorId,
  authorName: authorId,
  committedAtUnix,
  subject,
  fileChanges: files.map(([filePath, additions, deletions]) => ({ filePath, additions, deletions })),
  additions: files.reduce((sum, [, additions]) => sum + additions, 0),
  deletions: files.reduce((sum, [, , deletions]) => sum + deletions, 0),
});

export const pullRequest = (
  fields: Pick<PullRequest, "number" | "authorId" | "createdAtUnix"> & Partial<PullRequest>,
): PullRequest => ({
  title: `change #${fields.number}`,
  state: fields.mergedAtUnix === undefined || fields.mergedAtUnix === null ? "open" : "merged",
  mergedAtUnix: null,
  closedAtUnix: fields.mergedAtUnix ?? null,
  commitShas: [],
  reviews: [],
  ...fields,
});

export const review = (reviewerId: string, submittedAtUnix: number, verdict: Review["verdict"]): Review => ({
  reviewerId,
  submittedAtUnix,
  verdict,
});

export const issue = (fields: Pick<Issue, "number" | "authorId" | "createdAtUnix"> & Partial<Issue>): Issue => ({
  title: `issue #${fields.number}`,
  closedAtUnix: null,
  labels: [],
  ...fields,
});

export const branch = (fields: Pick<Branch, "name" | "lastActivityAtUnix"> & Partial<Branch>): Branch => ({
  headSha: `${fields.name}-head`,
  aheadBy: 1,
  behindBy: 0,
  merged: false,
  ...fields,
});

export const historyOf = (fields: Partial<NormalizedHistory>): NormalizedHistory => ({
  commits: [],
  pullRequests: [],
  issues: [],
  branches: [],
  defaultBranch: null,
  completeness: "complete",
  skipped: { commits: 0, pullRequests: 0, issues: 0, branches: 0, reviews: 0, total: 0 },
  filtered: 0,
  malformed: [],
  ...fields,
});
