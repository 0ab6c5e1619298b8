import {
  isNullableWithinWindow,
  isWithinWindow,
  type AnalysisWindow,
  type Changelog,
  type ChangelogEntry,
  type ChangelogGroup,
  type Commit,
  type PullRequest,
} from "@collabscope/core";
import type { ChangelogConfig } from "./collaboration-types.js";

const CONVENTIONAL_SUBJECT = /^([A-Za-z]+)(?:\(([^)]*)\))?(!)?:\s*(\S.*)$/;
const MIN_COMMIT_SUBJECT_LENGTH = 10;
const DEDUPE_KEY_LENGTH = 60;
const SHORT_SHA_LENGTH = 7;
const LEADING_CATEGORIES = ["feat", "fix"];
const FALLBACK_CATEGORY = "other";

type ParsedSubject = Pick<ChangelogEntry, "category" | "scope" | "breaking" | "description">;

export const parseConventionalSubject = (
  subject: string,
  categoryPrefixes: ReadonlyMap<string, string>,
): ParsedSubject => {
  const text = subject.trim();
  const match = CONVENTIONAL_SUBJECT.exec(text);
  const type = match?.[1];
  const category = type === undefined ? undefined : categoryPrefixes.get(type.toLowerCase());
  if (match === null || category === undefined) {
    return { category: FALLBACK_CATEGORY, scope: null, breaking: false, description: text };
  }

  const scope = match[2]?.trim() ?? "";
  return {
    category,
    scope: scope.length === 0 ? null : scope,
    breaking: match[3] === "!",
    description: (match[4] ?? text).trim(),
  };
};

const isMergeCommit = (commit: Commit): boolean => commit.subject.startsWith("Merge ");

const compareCategories = (a: string, b: string): number => {
  const rank = (category: string): number => {
    const leading = LEADING_CATEGORIES.indexOf(category);
    if (leading >= 0) {
      return leading;
    }
    return category === FALLBACK_CATEGORY ? LEADING_CATEGORIES.length + 1 : LEADING_CATEGORIES.length;
  };

  return rank(a) - rank(b) || a.localeCompare(b);
};

const compareEntries = (a: ChangelogEntry, b: ChangelogEntry): number =>
  b.timestampUnix - a.timestampUnix || a.reference.localeCompare(b.reference);

const dedupeKey = (entry: ChangelogEntry): string =>
  [entry.category, entry.scope ?? "", entry.description.toLowerCase().slice(0, DEDUPE_KEY_LENGTH)].join("\u0000");

/**
 * Near-duplicates share category, scope and the first characters of their
 * lower-cased description; the newest one stays.
 */
const dedupe = (entries: readonly ChangelogEntry[]): readonly ChangelogEntry[] => {
  const byKey = new Map<string, ChangelogEntry>();
  for (const entry of entries) {
    const key = dedupeKey(entry);
    const existing = byKey.get(key);
    if (existing === undefined || entry.timestampUnix > existing.timestampUnix) {
      byKey.set(key, entry);
    }
  }

  return [...byKey.values()];
};

export const synthesizeChangelog = (
  pullRequests: readonly PullRequest[],
  commits: readonly Commit[],
  window: AnalysisWindow,
  config: ChangelogConfig,
): Changelog => {
  const prefixes = new Map(
    Object.entries(config.categoryPrefixes).map(([key, value]) => [key.toLowerCase(), value] as const),
  );

  const merged = pullRequests.filter(
    (pullRequest) => pullRequest.state === "merged" && isNullableWithinWindow(pullRequest.mergedAtUnix, window),
  );
  const carriedShas = new Set(merged.flatMap((pullRequest) => pullRequest.commitShas));

  const fromPullRequests = merged.map((pullRequest): ChangelogEntry => ({
    ...parseConventionalSubject(pullRequest.title, prefixes),
    authorId: pullRequest.authorId,
    reference: `#${pullRequest.number}`,
    source: "pull_request",
    timestampUnix: pullRequest.mergedAtUnix ?? pullRequest.createdAtUnix,
  }));

  const fromCommits = commits
    .filter(
      (commit) =>
        isWithinWindow(commit.committedAtUnix, window) &&
        !isMergeCommit(commit) &&
        !carriedShas.has(commit.sha) &&
        commit.subject.trim().length >= MIN_COMMIT_SUBJECT_LENGTH,
    )
    .map((commit): ChangelogEntry => ({
      ...parseConventionalSubject(commit.subject, prefixes),
      authorId: commit.authorId,
      reference: commit.sha.slice(0, SHORT_SHA_LENGTH),
      source: "commit",
      timestampUnix: commit.committedAtUnix,
    }));

  const byCategory = new Map<string, ChangelogEntry[]>();
  const entries = dedupe([...fromPullRequests, ...fromCommits]);
  for (const entry of entries) {
    const current = byCategory.get(entry.category) ?? [];
    current.push(entry);
    byCategory.set(entry.category, current);
  }

  const groups: ChangelogGroup[] = [...byCategory.entries()]
    .sort(([a], [b]) => compareCategories(a, b))
    .map(([category, grouped]) => ({ category, entries: [...grouped].sort(compareEntries) }));

  return { groups, entryCount: entries.length };
};
