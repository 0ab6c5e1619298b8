import {
  isNullableWithinWindow,
  isWithinWindow,
  throwIfCancelled,
  toFolderPath,
  type AnalysisWindow,
  type ContributorActivity,
  type ContributorActivityTotals,
  type ContributorId,
  type ContributorStatsSummary,
  type NormalizedHistory,
} from "@collabscope/core";
import type { CancellationOptions, ContributorStatsConfig } from "./collaboration-types.js";

type MutableActivity = {
  contributorId: ContributorId;
  commitCount: number;
  linesAdded: number;
  linesRemoved: number;
  pullRequestsOpened: number;
  pullRequestsMerged: number;
  issuesOpened: number;
  issuesClosed: number;
  folders: Set<string>;
  firstCommitAtUnix: number | null;
  lastCommitAtUnix: number | null;
};

const createActivity = (contributorId: ContributorId): MutableActivity => ({
  contributorId,
  commitCount: 0,
  linesAdded: 0,
  linesRemoved: 0,
  pullRequestsOpened: 0,
  pullRequestsMerged: 0,
  issuesOpened: 0,
  issuesClosed: 0,
  folders: new Set<string>(),
  firstCommitAtUnix: null,
  lastCommitAtUnix: null,
});

const toActivity = (activity: MutableActivity): ContributorActivity => ({
  contributorId: activity.contributorId,
  commitCount: activity.commitCount,
  linesAdded: activity.linesAdded,
  linesRemoved: activity.linesRemoved,
  pullRequestsOpened: activity.pullRequestsOpened,
  pullRequestsMerged: activity.pullRequestsMerged,
  issuesOpened: activity.issuesOpened,
  issuesClosed: activity.issuesClosed,
  foldersTouched: [...activity.folders].sort((a, b) => a.localeCompare(b)),
  firstCommitAtUnix: activity.firstCommitAtUnix,
  lastCommitAtUnix: activity.lastCommitAtUnix,
});

const summarizeTotals = (contributors: readonly ContributorActivity[]): ContributorActivityTotals => {
  const totals: ContributorActivityTotals = {
    contributors: contributors.length,
    commits: 0,
    linesAdded: 0,
    linesRemoved: 0,
    pullRequestsOpened: 0,
    pullRequestsMerged: 0,
    issuesOpened: 0,
    issuesClosed: 0,
  };

  for (const contributor of contributors) {
    totals.commits += contributor.commitCount;
    totals.linesAdded += contributor.linesAdded;
    totals.linesRemoved += contributor.linesRemoved;
    totals.pullRequestsOpened += contributor.pullRequestsOpened;
    totals.pullRequestsMerged += contributor.pullRequestsMerged;
    totals.issuesOpened += contributor.issuesOpened;
    totals.issuesClosed += contributor.issuesClosed;
  }

  return totals;
};

export const computeContributorStats = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  config: ContributorStatsConfig,
  options: CancellationOptions = {},
): ContributorStatsSummary => {
  const byContributor = new Map<ContributorId, MutableActivity>();
  const activityOf = (contributorId: ContributorId): MutableActivity => {
    const existing = byContributor.get(contributorId);
    if (existing !== undefined) {
      return existing;
    }

    const created = createActivity(contributorId);
    byContributor.set(contributorId, created);
    return created;
  };

  const commits = history.commits.filter((commit) => isWithinWindow(commit.committedAtUnix, window));
  for (const [index, commit] of commits.entries()) {
    throwIfCancelled(options.signal, index);

    const activity = activityOf(commit.authorId);
    activity.commitCount += 1;
    activity.linesAdded += commit.additions;
    activity.linesRemoved += commit.deletions;
    for (const change of commit.fileChanges) {
      activity.folders.add(toFolderPath(change.filePath, config.folderDepth));
    }

    activity.firstCommitAtUnix = Math.min(activity.firstCommitAtUnix ?? commit.committedAtUnix, commit.committedAtUnix);
    activity.lastCommitAtUnix = Math.max(activity.lastCommitAtUnix ?? commit.committedAtUnix, commit.committedAtUnix);
  }

  for (const pullRequest of history.pullRequests) {
    if (isWithinWindow(pullRequest.createdAtUnix, window)) {
      activityOf(pullRequest.authorId).pullRequestsOpened += 1;
    }
    if (isNullableWithinWindow(pullRequest.mergedAtUnix, window)) {
      activityOf(pullRequest.authorId).pullRequestsMerged += 1;
    }
  }

  for (const issue of history.issues) {
    if (isWithinWindow(issue.createdAtUnix, window)) {
      activityOf(issue.authorId).issuesOpened += 1;
    }
    if (isNullableWithinWindow(issue.closedAtUnix, window)) {
      activityOf(issue.authorId).issuesClosed += 1;
    }
  }

  const contributors = [...byContributor.values()]
    .map(toActivity)
    .sort(
      (a, b) =>
        b.commitCount - a.commitCount ||
        b.linesAdded + b.linesRemoved - (a.linesAdded + a.linesRemoved) ||
        a.contributorId.localeCompare(b.contributorId),
    );

  return {
    contributors,
    totals: summarizeTotals(contributors),
  };
};
