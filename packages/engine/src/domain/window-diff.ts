import {
  round4,
  type FolderBusFactor,
  type MembershipDelta,
  type NumericDelta,
  type WindowMetrics,
  type WindowMetricsDiff,
} from "@collabscope/core";

type MetricReader = readonly [metric: string, read: (metrics: WindowMetrics) => number | null];

const NUMERIC_METRICS: readonly MetricReader[] = [
  ["contributors", (metrics) => metrics.contributors.totals.contributors],
  ["commits", (metrics) => metrics.contributors.totals.commits],
  ["lines_added", (metrics) => metrics.contributors.totals.linesAdded],
  ["lines_removed", (metrics) => metrics.contributors.totals.linesRemoved],
  ["pull_requests_opened", (metrics) => metrics.contributors.totals.pullRequestsOpened],
  ["pull_requests_merged", (metrics) => metrics.contributors.totals.pullRequestsMerged],
  ["issues_opened", (metrics) => metrics.contributors.totals.issuesOpened],
  ["issues_closed", (metrics) => metrics.contributors.totals.issuesClosed],
  ["primary_bus_factor", (metrics) => metrics.busFactor.primaryRisk?.busFactor ?? null],
  ["repository_bus_factor", (metrics) => metrics.busFactor.repositoryBusFactor],
  ["knowledge_silos", (metrics) => metrics.silos.length],
  ["pull_requests_in_scope", (metrics) => metrics.reviewCulture.pullRequestsInScope],
  ["pending_reviews", (metrics) => metrics.reviewCulture.pendingReviewCount],
  ["mean_hours_to_first_review", (metrics) => metrics.reviewCulture.meanHoursToFirstReview],
  ["median_hours_to_first_review", (metrics) => metrics.reviewCulture.medianHoursToFirstReview],
  ["merged_branches", (metrics) => metrics.branches.counts.merged],
  ["orphan_branches", (metrics) => metrics.branches.counts.orphan],
  ["abandoned_branches", (metrics) => metrics.branches.counts.abandoned],
  ["wip_branches", (metrics) => metrics.branches.counts.wip],
  ["changelog_entries", (metrics) => metrics.changelog.entryCount],
];

export const numericDelta = (metric: string, before: number | null, after: number | null): NumericDelta => ({
  metric,
  before,
  after,
  delta: before === null || after === null ? null : round4(after - before),
});

export const diffSets = (after: readonly string[], before: readonly string[]): MembershipDelta => {
  const afterSet = new Set(after);
  const beforeSet = new Set(before);

  const added = [...afterSet].filter((item) => !beforeSet.has(item)).sort((a, b) => a.localeCompare(b));
  const removed = [...beforeSet].filter((item) => !afterSet.has(item)).sort((a, b) => a.localeCompare(b));

  return { added, removed };
};

const diffKeyed = (
  before: ReadonlyMap<string, number | null>,
  after: ReadonlyMap<string, number | null>,
  missing: number | null,
): readonly NumericDelta[] =>
  [...new Set([...before.keys(), ...after.keys()])]
    .sort((a, b) => a.localeCompare(b))
    .map((key) => numericDelta(key, before.get(key) ?? missing, after.get(key) ?? missing));

const commitsByContributor = (metrics: WindowMetrics): ReadonlyMap<string, number> =>
  new Map(metrics.contributors.contributors.map((entry) => [entry.contributorId, entry.commitCount] as const));

const busFactorOf = (folder: FolderBusFactor): number | null =>
  folder.status === "defined" ? folder.busFactor : null;

const busFactorByFolder = (metrics: WindowMetrics): ReadonlyMap<string, number | null> =>
  new Map(metrics.busFactor.folders.map((folder) => [folder.folder, busFactorOf(folder)] as const));

/**
 * Deltas from `before` to `after`. Swapping the arguments negates every delta
 * and swaps every added/removed pair. Contributors absent from a window count
 * as zero commits; folders absent from a window have no bus factor.
 */
export const diffWindowMetrics = (before: WindowMetrics, after: WindowMetrics): WindowMetricsDiff => ({
  numeric: NUMERIC_METRICS.map(([metric, read]) => numericDelta(metric, read(before), read(after))),
  contributorCommits: diffKeyed(commitsByContributor(before), commitsByContributor(after), 0),
  folderBusFactors: diffKeyed(busFactorByFolder(before), busFactorByFolder(after), null),
  contributors: diffSets(
    after.contributors.contributors.map((entry) => entry.contributorId),
    before.contributors.contributors.map((entry) => entry.contributorId),
  ),
  folders: diffSets(
    after.busFactor.folders.map((folder) => folder.folder),
    before.busFactor.folders.map((folder) => folder.folder),
  ),
  bottleneckReviewers: diffSets(after.reviewCulture.bottleneckReviewers, before.reviewCulture.bottleneckReviewers),
  staleBranches: diffSets(after.branches.staleBranches, before.branches.staleBranches),
});
