import type { FolderBusFactor, FolderBusFactorDefined, WindowMetrics } from "@collabscope/core";
import {
  REPORT_SCHEMA_VERSION,
  type CollabscopeReport,
  type CollabscopeSnapshot,
  type FolderRiskItem,
  type SnapshotDiff,
} from "./domain.js";

const TOP_CONTRIBUTORS = 5;
const TOP_FOLDERS = 10;

const isDefined = (folder: FolderBusFactor): folder is FolderBusFactorDefined => folder.status === "defined";

const toFolderRisk = (folder: FolderBusFactorDefined): FolderRiskItem => ({
  folder: folder.folder,
  busFactor: folder.busFactor,
  totalWeight: folder.totalWeight,
  riskSet: folder.riskSet.map((owner) => owner.contributorId),
});

const riskiestFolders = (metrics: WindowMetrics): readonly FolderRiskItem[] => {
  const byFolder = new Map(
    metrics.busFactor.folders.filter(isDefined).map((folder) => [folder.folder, folder] as const),
  );

  return metrics.busFactor.ranking.flatMap((folder) => {
    const entry = byFolder.get(folder);
    return entry === undefined ? [] : [toFolderRisk(entry)];
  });
};

export const createReport = (snapshot: CollabscopeSnapshot, diff?: SnapshotDiff): CollabscopeReport => {
  const { metrics } = snapshot;
  const folders = riskiestFolders(metrics);

  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    generatedAt: snapshot.generatedAt,
    repository: {
      name: snapshot.source.repository,
      window: metrics.window,
      riskLevel: metrics.mitigation.riskLevel,
      primaryRisk: folders[0] ?? null,
      repositoryBusFactor: metrics.busFactor.repositoryBusFactor,
    },
    contributors: {
      total: metrics.contributors.totals.contributors,
      commits: metrics.contributors.totals.commits,
      top: metrics.contributors.contributors.slice(0, TOP_CONTRIBUTORS).map((contributor) => ({
        contributorId: contributor.contributorId,
        commitCount: contributor.commitCount,
        linesChanged: contributor.linesAdded + contributor.linesRemoved,
      })),
    },
    riskiestFolders: folders.slice(0, TOP_FOLDERS),
    silos: metrics.silos.map((silo) => ({ folder: silo.folder, ownerId: silo.ownerId, share: silo.share })),
    actions: metrics.mitigation.actions,
    reviewCulture: {
      pullRequestsInScope: metrics.reviewCulture.pullRequestsInScope,
      pendingReviewCount: metrics.reviewCulture.pendingReviewCount,
      medianHoursToFirstReview: metrics.reviewCulture.medianHoursToFirstReview,
      bottleneckReviewers: metrics.reviewCulture.bottleneckReviewers,
    },
    branches: {
      counts: metrics.branches.counts,
      staleBranches: metrics.branches.staleBranches,
      deletableBranches: metrics.branches.deletableBranches,
    },
    changelog: {
      entryCount: metrics.changelog.entryCount,
      categories: metrics.changelog.groups.map((group) => ({
        category: group.category,
        entries: group.entries.length,
      })),
    },
    appendix: {
      snapshotSchemaVersion: snapshot.schemaVersion,
      metricsModelVersion: snapshot.metricsModelVersion,
      timestamp: snapshot.generatedAt,
      ...(snapshot.analysisOptions === undefined ? {} : { analysisOptions: snapshot.analysisOptions }),
    },
    ...(diff === undefined ? {} : { diff }),
  };
};
