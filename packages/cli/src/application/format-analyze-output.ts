import type {
  ContributorRemovalScenario,
  FolderDeprecationScenario,
  KeyScenarioSet,
  MitigationAction,
  WindowMetrics,
} from "@collabscope/core";
import { formatWindow } from "@collabscope/reporter";

export type AnalyzeOutputMode = "summary" | "json";

type SummaryShape = {
  window: string;
  riskLevel: WindowMetrics["mitigation"]["riskLevel"];
  contributors: {
    total: number;
    commits: number;
    top: readonly string[];
  };
  busFactor: {
    primaryRisk: WindowMetrics["busFactor"]["primaryRisk"];
    repositoryBusFactor: number | null;
    riskiestFolders: readonly string[];
    silos: readonly string[];
  };
  actions: readonly MitigationAction[];
  reviewCulture: {
    pullRequestsInScope: number;
    pendingReviewCount: number;
    medianHoursToFirstReview: number | null;
    bottleneckReviewers: readonly string[];
  };
  branches: WindowMetrics["branches"]["counts"];
  changelogEntries: number;
};

const createSummaryShape = (metrics: WindowMetrics): SummaryShape => ({
  window: formatWindow(metrics.window),
  riskLevel: metrics.mitigation.riskLevel,
  contributors: {
    total: metrics.contributors.totals.contributors,
    commits: metrics.contributors.totals.commits,
    top: metrics.contributors.contributors.slice(0, 5).map((contributor) => contributor.contributorId),
  },
  busFactor: {
    primaryRisk: metrics.busFactor.primaryRisk,
    repositoryBusFactor: metrics.busFactor.repositoryBusFactor,
    riskiestFolders: metrics.busFactor.ranking.slice(0, 5),
    silos: metrics.silos.map((silo) => silo.folder),
  },
  actions: metrics.mitigation.actions,
  reviewCulture: {
    pullRequestsInScope: metrics.reviewCulture.pullRequestsInScope,
    pendingReviewCount: metrics.reviewCulture.pendingReviewCount,
    medianHoursToFirstReview: metrics.reviewCulture.medianHoursToFirstReview,
    bottleneckReviewers: metrics.reviewCulture.bottleneckReviewers,
  },
  branches: metrics.branches.counts,
  changelogEntries: metrics.changelog.entryCount,
});

export const formatAnalyzeOutput = (metrics: WindowMetrics, mode: AnalyzeOutputMode): string =>
  mode === "json" ? JSON.stringify(metrics, null, 2) : JSON.stringify(createSummaryShape(metrics), null, 2);

export type WhatIfResult = {
  removal?: ContributorRemovalScenario;
  deprecation?: FolderDeprecationScenario;
  keyScenarios?: KeyScenarioSet;
};

const ORPHANED_FILES_SHOWN = 30;

const summarizeRemoval = (scenario: ContributorRemovalScenario) => ({
  removed: scenario.removed,
  primaryRiskBefore: scenario.before.primaryRisk,
  primaryRiskAfter: scenario.after.primaryRisk,
  repositoryBusFactorBefore: scenario.before.repositoryBusFactor,
  repositoryBusFactorAfter: scenario.after.repositoryBusFactor,
  orphanedFolders: scenario.orphanedFolders,
  orphanedFileCount: scenario.orphanedFiles.length,
  orphanedFiles: scenario.orphanedFiles.slice(0, ORPHANED_FILES_SHOWN),
  affectedAreas: scenario.affectedAreas,
  changedFolders: scenario.changedFolders.map(
    (change) => `${change.folder}: ${change.busFactorBefore ?? "n/a"} -> ${change.busFactorAfter ?? "n/a"}`,
  ),
});

export const formatWhatIfOutput = (result: WhatIfResult, mode: AnalyzeOutputMode): string => {
  if (mode === "json") {
    return JSON.stringify(result, null, 2);
  }

  return JSON.stringify(
    {
      ...(result.removal === undefined ? {} : { removal: summarizeRemoval(result.removal) }),
      ...(result.deprecation === undefined ? {} : { deprecation: result.deprecation }),
      ...(result.keyScenarios === undefined
        ? {}
        : {
            keyScenarios: {
              removals: result.keyScenarios.removals.map(summarizeRemoval),
              deprecations: result.keyScenarios.deprecations,
            },
          }),
    },
    null,
    2,
  );
};
