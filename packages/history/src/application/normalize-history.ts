import type { z } from "zod";
import type {
  Branch,
  Commit,
  DefaultBranch,
  FileChange,
  Issue,
  MalformedRecord,
  NormalizedHistory,
  PullRequest,
  RecordKind,
  Review,
  ReviewVerdict,
} from "@collabscope/core";
import { buildEmailLoginMap, normalizeEmail, normalizeIdentity } from "../domain/identity.js";
import {
  rawBranchSchema,
  rawCommitSchema,
  rawDefaultBranchSchema,
  rawIssueSchema,
  rawPullRequestSchema,
  rawReviewSchema,
  type ClonedCommit,
  type RawHistoryInput,
} from "../domain/raw-records.js";
import { parseOptionalTimestamp, parseTimestamp } from "../parsing/timestamps.js";

export type NormalizeProgressEvent =
  | { stage: "records_received"; commits: number; pullRequests: number; issues: number; branches: number }
  | { stage: "cloned_commits_merged"; filled: number; added: number }
  | { stage: "history_normalized"; commits: number; pullRequests: number; issues: number; branches: number; skipped: number };

type DraftFile = {
  filePath: string;
  additions: number | null;
  deletions: number | null;
};

type CommitDraft = {
  sha: string;
  login: string | null;
  authorName: string;
  authorEmail: string;
  committedAtUnix: number;
  subject: string;
  files: DraftFile[];
  totals: { additions: number; deletions: number } | null;
};

const GHOST_LOGIN = "ghost";

class MalformedRecordCollector {
  private readonly records: MalformedRecord[] = [];
  private readonly counts: Record<RecordKind, number> = {
    commit: 0,
    pull_request: 0,
    issue: 0,
    branch: 0,
    review: 0,
  };

  add(kind: RecordKind, id: string | null, reason: string): void {
    this.counts[kind] += 1;
    this.records.push({ kind, id, reason });
  }

  build(): Pick<NormalizedHistory, "skipped" | "malformed"> {
    const { commit, pull_request, issue, branch, review } = this.counts;
    return {
      skipped: {
        commits: commit,
        pullRequests: pull_request,
        issues: issue,
        branches: branch,
        reviews: review,
        total: commit + pull_request + issue + branch + review,
      },
      malformed: [...this.records],
    };
  }
}

const extractRecordId = (raw: unknown, key: string): string | null => {
  if (typeof raw !== "object" || raw === null) {
    return null;
  }

  const value: unknown = Reflect.get(raw, key);
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }

  return null;
};

const describeIssues = (error: z.ZodError): string => {
  const first = error.issues[0];
  if (first === undefined) {
    return "invalid_record";
  }

  const path = first.path.length === 0 ? "record" : first.path.join(".");
  return `invalid_record: ${path}: ${first.message}`;
};

const firstLine = (message: string): string => message.split("\n")[0]?.trim() ?? "";

const apportion = (total: number, parts: number): number[] => {
  if (parts === 0) {
    return [];
  }

  const base = Math.floor(total / parts);
  const remainder = total % parts;
  return Array.from({ length: parts }, (_, index) => base + (index < remainder ? 1 : 0));
};

const mergeDuplicateFiles = (files: readonly DraftFile[]): DraftFile[] => {
  const byPath = new Map<string, DraftFile>();
  for (const file of files) {
    const current = byPath.get(file.filePath);
    if (current === undefined) {
      byPath.set(file.filePath, { ...file });
      continue;
    }

    current.additions =
      current.additions === null || file.additions === null ? null : current.additions + file.additions;
    current.deletions =
      current.deletions === null || file.deletions === null ? null : current.deletions + file.deletions;
  }

  return [...byPath.values()].sort((a, b) => a.filePath.localeCompare(b.filePath));
};

// Per-file counts the fetcher left out are apportioned from the commit totals.
const resolveFileChanges = (draft: CommitDraft): { fileChanges: FileChange[]; additions: number; deletions: number } => {
  const files = mergeDuplicateFiles(draft.files);
  const knownAdditions = files.reduce((sum, file) => sum + (file.additions ?? 0), 0);
  const knownDeletions = files.reduce((sum, file) => sum + (file.deletions ?? 0), 0);

  const missingAdditions = files.filter((file) => file.additions === null);
  const missingDeletions = files.filter((file) => file.deletions === null);
  const additionShares = apportion(
    Math.max(0, (draft.totals?.additions ?? knownAdditions) - knownAdditions),
    missingAdditions.length,
  );
  const deletionShares = apportion(
    Math.max(0, (draft.totals?.deletions ?? knownDeletions) - knownDeletions),
    missingDeletions.length,
  );

  const fileChanges = files.map((file) => ({
    filePath: file.filePath,
    additions: file.additions ?? additionShares[missingAdditions.indexOf(file)] ?? 0,
    deletions: file.deletions ?? deletionShares[missingDeletions.indexOf(file)] ?? 0,
  }));

  return {
    fileChanges,
    additions: draft.totals?.additions ?? fileChanges.reduce((sum, file) => sum + file.additions, 0),
    deletions: draft.totals?.deletions ?? fileChanges.reduce((sum, file) => sum + file.deletions, 0),
  };
};

const collectCommitDrafts = (
  rawCommits: readonly unknown[],
  malformed: MalformedRecordCollector,
): Map<string, CommitDraft> => {
  const drafts = new Map<string, CommitDraft>();

  for (const raw of rawCommits) {
    const parsed = rawCommitSchema.safeParse(raw);
    if (!parsed.success) {
      malformed.add("commit", extractRecordId(raw, "sha"), describeIssues(parsed.error));
      continue;
    }

    const record = parsed.data;
    const committedAtUnix = parseTimestamp(record.commit.author.date);
    if (committedAtUnix === null) {
      malformed.add("commit", record.sha, "unparseable_timestamp: commit.author.date");
      continue;
    }

    const files: DraftFile[] = (record.files ?? []).map((file) => ({
      filePath: file.filename,
      additions: file.additions ?? null,
      deletions: file.deletions ?? null,
    }));
    const existing = drafts.get(record.sha);
    if (existing !== undefined) {
      if (existing.files.length === 0 && files.length > 0) {
        existing.files = files;
      }
      existing.totals = existing.totals ?? record.stats ?? null;
      continue;
    }

    drafts.set(record.sha, {
      sha: record.sha,
      login: record.author?.login ?? null,
      authorName: record.commit.author.name,
      authorEmail: record.commit.author.email,
      committedAtUnix,
      subject: firstLine(record.commit.message),
      files,
      totals: record.stats ?? null,
    });
  }

  return drafts;
};

const mergeClonedCommits = (
  drafts: Map<string, CommitDraft>,
  clonedCommits: readonly ClonedCommit[],
): { filled: number; added: number } => {
  let filled = 0;
  let added = 0;

  for (const cloned of clonedCommits) {
    const clonedFiles: DraftFile[] = cloned.fileChanges.map((change) => ({ ...change }));
    const existing = drafts.get(cloned.sha);
    if (existing !== undefined) {
      if (existing.files.length === 0 && clonedFiles.length > 0) {
        existing.files = clonedFiles;
        filled += 1;
      }
      continue;
    }

    drafts.set(cloned.sha, {
      sha: cloned.sha,
      login: null,
      authorName: cloned.authorName,
      authorEmail: cloned.authorEmail,
      committedAtUnix: cloned.committedAtUnix,
      subject: cloned.subject,
      files: clonedFiles,
      totals: null,
    });
    added += 1;
  }

  return { filled, added };
};

const finalizeCommits = (drafts: ReadonlyMap<string, CommitDraft>): Commit[] => {
  const emailLogins = buildEmailLoginMap(
    [...drafts.values()].map((draft) => ({ email: draft.authorEmail, login: draft.login })),
  );

  return [...drafts.values()]
    .map((draft) => {
      const { fileChanges, additions, deletions } = resolveFileChanges(draft);
      const login = draft.login ?? emailLogins.get(normalizeEmail(draft.authorEmail)) ?? null;
      return {
        sha: draft.sha,
        authorId: normalizeIdentity({ login, email: draft.authorEmail, name: draft.authorName }),
        authorName: draft.authorName,
        committedAtUnix: draft.committedAtUnix,
        subject: draft.subject,
        fileChanges,
        additions,
        deletions,
      };
    })
    .sort((a, b) => a.committedAtUnix - b.committedAtUnix || a.sha.localeCompare(b.sha));
};

const toVerdict = (state: string): ReviewVerdict | "pending" | null => {
  switch (state.trim().toUpperCase()) {
    case "APPROVED":
      return "approved";
    case "CHANGES_REQUESTED":
    case "REQUEST_CHANGES":
      return "changes_requested";
    case "COMMENTED":
    case "DISMISSED":
      return "commented";
    case "PENDING":
      return "pending";
    default:
      return null;
  }
};

const normalizeReviews = (
  pullRequestNumber: number,
  rawReviews: readonly unknown[],
  malformed: MalformedRecordCollector,
): Review[] => {
  const reviews: Review[] = [];
  const reviewId = `#${pullRequestNumber}`;

  for (const raw of rawReviews) {
    const parsed = rawReviewSchema.safeParse(raw);
    if (!parsed.success) {
      malformed.add("review", reviewId, describeIssues(parsed.error));
      continue;
    }

    const verdict = toVerdict(parsed.data.state);
    if (verdict === null) {
      malformed.add("review", reviewId, `unknown_review_state: ${parsed.data.state}`);
      continue;
    }

    if (verdict === "pending" || parsed.data.submitted_at === null || parsed.data.submitted_at === undefined) {
      malformed.add("review", reviewId, "unsubmitted_review");
      continue;
    }

    const submittedAtUnix = parseTimestamp(parsed.data.submitted_at);
    if (submittedAtUnix === null) {
      malformed.add("review", reviewId, "unparseable_timestamp: submitted_at");
      continue;
    }

    reviews.push({
      reviewerId: normalizeIdentity({ login: parsed.data.user?.login ?? GHOST_LOGIN, email: "", name: "" }),
      submittedAtUnix,
      verdict,
    });
  }

  return reviews.sort(
    (a, b) => a.submittedAtUnix - b.submittedAtUnix || a.reviewerId.localeCompare(b.reviewerId),
  );
};

const normalizePullRequests = (
  rawPullRequests: readonly unknown[],
  malformed: MalformedRecordCollector,
): PullRequest[] => {
  const byNumber = new Map<number, PullRequest>();

  for (const raw of rawPullRequests) {
    const parsed = rawPullRequestSchema.safeParse(raw);
    if (!parsed.success) {
      malformed.add("pull_request", extractRecordId(raw, "number"), describeIssues(parsed.error));
      continue;
    }

    const record = parsed.data;
    const id = String(record.number);
    if (byNumber.has(record.number)) {
      continue;
    }

    const createdAtUnix = parseTimestamp(record.created_at);
    const mergedAt = parseOptionalTimestamp(record.merged_at);
    const closedAt = parseOptionalTimestamp(record.closed_at);
    if (createdAtUnix === null || !mergedAt.ok || !closedAt.ok) {
      malformed.add("pull_request", id, "unparseable_timestamp");
      continue;
    }

    if (mergedAt.value !== null && mergedAt.value < createdAtUnix) {
      malformed.add("pull_request", id, "inconsistent_lifecycle: merged_at before created_at");
      continue;
    }

    if (closedAt.value !== null && closedAt.value < createdAtUnix) {
      malformed.add("pull_request", id, "inconsistent_lifecycle: closed_at before created_at");
      continue;
    }

    const commitShas = [
      ...new Set([...(record.commits ?? []), ...(record.merge_commit_sha ? [record.merge_commit_sha] : [])]),
    ].sort((a, b) => a.localeCompare(b));

    byNumber.set(record.number, {
      number: record.number,
      title: record.title.trim(),
      authorId: normalizeIdentity({ login: record.user?.login ?? GHOST_LOGIN, email: "", name: "" }),
      state: mergedAt.value !== null ? "merged" : closedAt.value !== null ? "closed" : "open",
      createdAtUnix,
      mergedAtUnix: mergedAt.value,
      closedAtUnix: closedAt.value,
      commitShas,
      reviews: normalizeReviews(record.number, record.reviews ?? [], malformed),
    });
  }

  return [...byNumber.values()].sort((a, b) => a.createdAtUnix - b.createdAtUnix || a.number - b.number);
};

const normalizeIssues = (
  rawIssues: readonly unknown[],
  malformed: MalformedRecordCollector,
): { issues: Issue[]; filtered: number } => {
  const byNumber = new Map<number, Issue>();
  let filtered = 0;

  for (const raw of rawIssues) {
    const parsed = rawIssueSchema.safeParse(raw);
    if (!parsed.success) {
      malformed.add("issue", extractRecordId(raw, "number"), describeIssues(parsed.error));
      continue;
    }

    const record = parsed.data;
    if (record.pull_request !== undefined && record.pull_request !== null) {
      filtered += 1;
      continue;
    }

    if (byNumber.has(record.number)) {
      continue;
    }

    const id = String(record.number);
    const createdAtUnix = parseTimestamp(record.created_at);
    const closedAt = parseOptionalTimestamp(record.closed_at);
    if (createdAtUnix === null || !closedAt.ok) {
      malformed.add("issue", id, "unparseable_timestamp");
      continue;
    }

    if (closedAt.value !== null && closedAt.value < createdAtUnix) {
      malformed.add("issue", id, "inconsistent_lifecycle: closed_at before created_at");
      continue;
    }

    const labels = record.labels.map((label) => (typeof label === "string" ? label : label.name).trim());
    byNumber.set(record.number, {
      number: record.number,
      title: record.title.trim(),
      authorId: normalizeIdentity({ login: record.user?.login ?? GHOST_LOGIN, email: "", name: "" }),
      createdAtUnix,
      closedAtUnix: closedAt.value,
      labels: [...new Set(labels.filter((label) => label.length > 0))].sort((a, b) => a.localeCompare(b)),
    });
  }

  return {
    issues: [...byNumber.values()].sort((a, b) => a.createdAtUnix - b.createdAtUnix || a.number - b.number),
    filtered,
  };
};

const normalizeBranches = (rawBranches: readonly unknown[], malformed: MalformedRecordCollector): Branch[] => {
  const byName = new Map<string, Branch>();

  for (const raw of rawBranches) {
    const parsed = rawBranchSchema.safeParse(raw);
    if (!parsed.success) {
      malformed.add("branch", extractRecordId(raw, "name"), describeIssues(parsed.error));
      continue;
    }

    const record = parsed.data;
    if (byName.has(record.name)) {
      continue;
    }

    const lastActivityAtUnix = parseTimestamp(record.commit.date);
    if (lastActivityAtUnix === null) {
      malformed.add("branch", record.name, "unparseable_timestamp: commit.date");
      continue;
    }

    byName.set(record.name, {
      name: record.name,
      headSha: record.commit.sha,
      lastActivityAtUnix,
      aheadBy: record.ahead_by,
      behindBy: record.behind_by,
      merged: record.merged,
    });
  }

  return [...byName.values()].sort((a, b) => a.name.localeCompare(b.name));
};

const normalizeDefaultBranch = (raw: unknown, malformed: MalformedRecordCollector): DefaultBranch | null => {
  if (raw === undefined || raw === null) {
    return null;
  }

  const parsed = rawDefaultBranchSchema.safeParse(raw);
  if (!parsed.success) {
    malformed.add("branch", extractRecordId(raw, "name"), describeIssues(parsed.error));
    return null;
  }

  return parsed.data;
};

export const normalizeHistory = (
  input: RawHistoryInput,
  onProgress?: (event: NormalizeProgressEvent) => void,
): NormalizedHistory => {
  const malformed = new MalformedRecordCollector();
  const rawCommits = input.commits ?? [];
  const rawPullRequests = input.pullRequests ?? [];
  const rawIssues = input.issues ?? [];
  const rawBranches = input.branches ?? [];

  onProgress?.({
    stage: "records_received",
    commits: rawCommits.length,
    pullRequests: rawPullRequests.length,
    issues: rawIssues.length,
    branches: rawBranches.length,
  });

  const drafts = collectCommitDrafts(rawCommits, malformed);
  if (input.clonedCommits !== undefined) {
    onProgress?.({ stage: "cloned_commits_merged", ...mergeClonedCommits(drafts, input.clonedCommits) });
  }

  const commits = finalizeCommits(drafts);
  const pullRequests = normalizePullRequests(rawPullRequests, malformed);
  const { issues, filtered } = normalizeIssues(rawIssues, malformed);
  const branches = normalizeBranches(rawBranches, malformed);
  const defaultBranch = normalizeDefaultBranch(input.defaultBranch, malformed);
  const { skipped, malformed: malformedRecords } = malformed.build();

  onProgress?.({
    stage: "history_normalized",
    commits: commits.length,
    pullRequests: pullRequests.length,
    issues: issues.length,
    branches: branches.length,
    skipped: skipped.total,
  });

  return {
    commits,
    pullRequests,
    issues,
    branches,
    defaultBranch,
    completeness: input.pagination ?? "complete",
    skipped,
    filtered,
    malformed: malformedRecords,
  };
};
