import type {
  AnalysisOutcome,
  AnalysisWindow,
  BusFactorSummary,
  Changelog,
  ContributorStatsSummary,
  NormalizedHistory,
  OwnershipMatrix,
  ReviewCultureSummary,
  StaleBranchSummary,
  WindowMetrics,
} from "@collabscope/core";
import {
  classifyBranches,
  computeContributorStats as aggregateContributorStats,
  computeReviewCulture as aggregateReviewCulture,
  synthesizeChangelog,
} from "@collabscope/collaboration";
import {
  buildMitigationPlan,
  buildOwnershipMatrix,
  computeBusFactor as summarizeBusFactor,
  findKnowledgeSilos,
} from "@collabscope/ownership";
import type { AnalysisOptions, AnalysisOptionsOverrides } from "../domain/analysis-options.js";
import { runAnalysis, type AnalysisControl } from "./run-analysis.js";

export const ownershipMatrixFor = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  options: AnalysisOptions,
  control: AnalysisControl | undefined,
): OwnershipMatrix =>
  buildOwnershipMatrix(
    history.commits,
    window,
    {
      folderDepth: options.folderDepth,
      decayHalfLifeDays: options.decayHalfLifeDays,
      referenceTimeUnix: options.referenceTimeUnix,
    },
    {
      ...(control?.signal === undefined ? {} : { signal: control.signal }),
      onProgress: (event) =>
        control?.onProgress?.({
          stage: "commits_processed",
          metric: "ownership",
          processedCommits: event.processedCommits,
          totalCommits: event.totalCommits,
        }),
    },
  );

const contributorStatsFor = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  options: AnalysisOptions,
  control: AnalysisControl | undefined,
): ContributorStatsSummary =>
  aggregateContributorStats(
    history,
    window,
    { folderDepth: options.folderDepth },
    control?.signal === undefined ? {} : { signal: control.signal },
  );

const busFactorFor = (matrix: OwnershipMatrix, options: AnalysisOptions): BusFactorSummary =>
  summarizeBusFactor(matrix, { coverageThreshold: options.coverageThreshold });

/** Computes every metric for one window. Throws on cancellation; callers wrap it in the outcome contract. */
export const computeWindowMetrics = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  options: AnalysisOptions,
  control?: AnalysisControl,
): WindowMetrics => {
  const step = <T>(metric: string, compute: () => T): T => {
    control?.onProgress?.({ stage: "metric_started", metric });
    const value = compute();
    control?.onProgress?.({ stage: "metric_computed", metric });
    return value;
  };

  const contributors = step("contributors", () => contributorStatsFor(history, window, options, control));
  const ownership = step("ownership", () => ownershipMatrixFor(history, window, options, control));
  const busFactor = step("bus_factor", () => busFactorFor(ownership, options));
  const silos = step("silos", () => findKnowledgeSilos(ownership, options.siloShareThreshold));
  const mitigation = step("mitigation", () => buildMitigationPlan(ownership, busFactor));
  const reviewCulture = step("review_culture", () =>
    aggregateReviewCulture(history.pullRequests, window, { bottleneckPercentile: options.bottleneckPercentile }),
  );
  const branches = step("branches", () =>
    classifyBranches(history.branches, history.defaultBranch, window, {
      inactivityThresholdDays: options.inactivityThresholdDays,
    }),
  );
  const changelog = step("changelog", () =>
    synthesizeChangelog(history.pullRequests, history.commits, window, {
      categoryPrefixes: options.categoryPrefixes,
    }),
  );

  return { window, contributors, ownership, busFactor, silos, mitigation, reviewCulture, branches, changelog };
};

export const isEmptyWindow = (metrics: WindowMetrics): boolean =>
  metrics.contributors.contributors.length === 0 &&
  metrics.reviewCulture.pullRequestsInScope === 0 &&
  metrics.changelog.entryCount === 0;

export const analyzeWindow = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<WindowMetrics> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) => computeWindowMetrics(history, window, options, control),
    isEmpty: isEmptyWindow,
  });

export const computeContributorStats = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<ContributorStatsSummary> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) => contributorStatsFor(history, window, options, control),
    isEmpty: (summary) => summary.contributors.length === 0,
  });

export const computeKnowledgeMap = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<OwnershipMatrix> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) => ownershipMatrixFor(history, window, options, control),
    isEmpty: (matrix) => matrix.cells.length === 0,
  });

export const computeBusFactor = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<BusFactorSummary> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) => busFactorFor(ownershipMatrixFor(history, window, options, control), options),
    isEmpty: (summary) => summary.primaryRisk === null,
  });

export const computeReviewCulture = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<ReviewCultureSummary> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) =>
      aggregateReviewCulture(history.pullRequests, window, { bottleneckPercentile: options.bottleneckPercentile }),
    isEmpty: (summary) => summary.pullRequestsInScope === 0,
  });

export const computeStaleBranches = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<StaleBranchSummary> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) =>
      classifyBranches(history.branches, history.defaultBranch, window, {
        inactivityThresholdDays: options.inactivityThresholdDays,
      }),
    isEmpty: (summary) => summary.branches.length === 0,
  });

export const computeChangelog = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<Changelog> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) =>
      synthesizeChangelog(history.pullRequests, history.commits, window, {
        categoryPrefixes: options.categoryPrefixes,
      }),
    isEmpty: (changelog) => changelog.entryCount === 0,
  });
