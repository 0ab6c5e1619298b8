import type {
  AnalysisWindow,
  ContributorId,
  FolderPath,
  MitigationAction,
  MitigationRiskLevel,
  NumericDelta,
  WindowMetrics,
  WindowMetricsDiff,
} from "@collabscope/core";
import type { AnalysisOptions } from "@collabscope/engine";

export const SNAPSHOT_SCHEMA_VERSION = "collabscope.snapshot.v1" as const;
export const REPORT_SCHEMA_VERSION = "collabscope.report.v1" as const;
export const METRICS_MODEL_VERSION = "deterministic-v1" as const;

export type SnapshotSchemaVersion = typeof SNAPSHOT_SCHEMA_VERSION;
export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "json" | "text" | "md";

export type CollabscopeSnapshot = {
  schemaVersion: SnapshotSchemaVersion;
  generatedAt: string;
  metricsModelVersion: string;
  source: {
    repository: string;
  };
  metrics: WindowMetrics;
  analysisOptions?: AnalysisOptions;
};

export type SnapshotDiff = {
  baselineWindow: AnalysisWindow;
  currentWindow: AnalysisWindow;
  metrics: WindowMetricsDiff;
};

export type FolderRiskItem = {
  folder: FolderPath;
  busFactor: number;
  totalWeight: number;
  riskSet: readonly ContributorId[];
};

export type CollabscopeReport = {
  schemaVersion: ReportSchemaVersion;
  generatedAt: string;
  repository: {
    name: string;
    window: AnalysisWindow;
    riskLevel: MitigationRiskLevel;
    primaryRisk: FolderRiskItem | null;
    repositoryBusFactor: number | null;
  };
  contributors: {
    total: number;
    commits: number;
    top: ReadonlyArray<{ contributorId: ContributorId; commitCount: number; linesChanged: number }>;
  };
  riskiestFolders: readonly FolderRiskItem[];
  silos: ReadonlyArray<{ folder: FolderPath; ownerId: ContributorId; share: number }>;
  actions: readonly MitigationAction[];
  reviewCulture: {
    pullRequestsInScope: number;
    pendingReviewCount: number;
    medianHoursToFirstReview: number | null;
    bottleneckReviewers: readonly ContributorId[];
  };
  branches: {
    counts: WindowMetrics["branches"]["counts"];
    staleBranches: readonly string[];
    deletableBranches: readonly string[];
  };
  changelog: {
    entryCount: number;
    categories: ReadonlyArray<{ category: string; entries: number }>;
  };
  appendix: {
    snapshotSchemaVersion: string;
    metricsModelVersion: string;
    timestamp: string;
    analysisOptions?: AnalysisOptions;
  };
  diff?: SnapshotDiff;
};

export const formatWindow = (window: AnalysisWindow): string =>
  `${new Date(window.startUnix * 1000).toISOString()} .. ${new Date(window.endUnix * 1000).toISOString()}`;

export const formatDelta = (delta: NumericDelta): string => {
  const before = delta.before ?? "n/a";
  const after = delta.after ?? "n/a";
  if (delta.delta === null) {
    return `${before} -> ${after}`;
  }

  const sign = delta.delta > 0 ? "+" : "";
  return `${before} -> ${after} (${sign}${delta.delta})`;
};
