export type ContributorId = string;

export type FolderPath = string;

export type AnalysisWindow = {
  startUnix: number;
  endUnix: number;
};

export const SECONDS_PER_DAY = 24 * 60 * 60;
export const SECONDS_PER_HOUR = 60 * 60;

export const isWithinWindow = (timestampUnix: number, window: AnalysisWindow): boolean =>
  timestampUnix >= window.startUnix && timestampUnix < window.endUnix;

export const isNullableWithinWindow = (timestampUnix: number | null, window: AnalysisWindow): boolean =>
  timestampUnix !== null && isWithinWindow(timestampUnix, window);

export const round4 = (value: number): number => Number(value.toFixed(4)) + 0;

export const toFolderPath = (filePath: string, folderDepth: number): FolderPath => {
  const segments = filePath.split("/").filter((segment) => segment.length > 0);
  const directorySegments = segments.slice(0, -1);
  if (directorySegments.length === 0) {
    return ".";
  }

  return directorySegments.slice(0, Math.max(1, folderDepth)).join("/");
};

export type FileChange = {
  readonly filePath: string;
  readonly additions: number;
  readonly deletions: number;
};

export type Commit = {
  readonly sha: string;
  readonly authorId: ContributorId;
  readonly authorName: string;
  readonly committedAtUnix: number;
  readonly subject: string;
  readonly fileChanges: readonly FileChange[];
  readonly additions: number;
  readonly deletions: number;
};

export type ReviewVerdict = "approved" | "changes_requested" | "commented";

export type Review = {
  readonly reviewerId: ContributorId;
  readonly submittedAtUnix: number;
  readonly verdict: ReviewVerdict;
};

export type PullRequestState = "open" | "merged" | "closed";

export type PullRequest = {
  readonly number: number;
  readonly title: string;
  readonly authorId: ContributorId;
  readonly state: PullRequestState;
  readonly createdAtUnix: number;
  readonly mergedAtUnix: number | null;
  readonly closedAtUnix: number | null;
  readonly commitShas: readonly string[];
  readonly reviews: readonly Review[];
};

export type Issue = {
  readonly number: number;
  readonly title: string;
  readonly authorId: ContributorId;
  readonly createdAtUnix: number;
  readonly closedAtUnix: number | null;
  readonly labels: readonly string[];
};

export type Branch = {
  readonly name: string;
  readonly headSha: string;
  readonly lastActivityAtUnix: number;
  readonly aheadBy: number;
  readonly behindBy: number;
  readonly merged: boolean;
};

export type DefaultBranch = {
  readonly name: string;
  readonly headSha: string;
};

export type RecordKind = "commit" | "pull_request" | "issue" | "branch" | "review";

export type MalformedRecord = {
  readonly kind: RecordKind;
  readonly id: string | null;
  readonly reason: string;
};

export type SkippedRecordCounts = {
  readonly commits: number;
  readonly pullRequests: number;
  readonly issues: number;
  readonly branches: number;
  readonly reviews: number;
  readonly total: number;
};

export type HistoryCompleteness = "complete" | "partial";

export type NormalizedHistory = {
  readonly commits: readonly Commit[];
  readonly pullRequests: readonly PullRequest[];
  readonly issues: readonly Issue[];
  readonly branches: readonly Branch[];
  readonly defaultBranch: DefaultBranch | null;
  readonly completeness: HistoryCompleteness;
  readonly skipped: SkippedRecordCounts;
  readonly filtered: number;
  readonly malformed: readonly MalformedRecord[];
};

export type ContributorActivity = {
  contributorId: ContributorId;
  commitCount: number;
  linesAdded: number;
  linesRemoved: number;
  pullRequestsOpened: number;
  pullRequestsMerged: number;
  issuesOpened: number;
  issuesClosed: number;
  foldersTouched: readonly FolderPath[];
  firstCommitAtUnix: number | null;
  lastCommitAtUnix: number | null;
};

export type ContributorActivityTotals = {
  contributors: number;
  commits: number;
  linesAdded: number;
  linesRemoved: number;
  pullRequestsOpened: number;
  pullRequestsMerged: number;
  issuesOpened: number;
  issuesClosed: number;
};

export type ContributorStatsSummary = {
  contributors: readonly ContributorActivity[];
  totals: ContributorActivityTotals;
};

export type OwnershipCell = {
  contributorId: ContributorId;
  folder: FolderPath;
  weight: number;
  commits: number;
  linesChanged: number;
};

export type OwnershipMatrix = {
  folderDepth: number;
  decayHalfLifeDays: number | null;
  referenceTimeUnix: number;
  cells: readonly OwnershipCell[];
};

export type FolderOwner = {
  contributorId: ContributorId;
  weight: number;
  share: number;
};

export type FolderBusFactorDefined = {
  folder: FolderPath;
  status: "defined";
  busFactor: number;
  totalWeight: number;
  riskSet: readonly FolderOwner[];
  owners: readonly FolderOwner[];
};

export type FolderBusFactorUndefined = {
  folder: FolderPath;
  status: "undefined";
  reason: "zero_total_weight";
};

export type FolderBusFactor = FolderBusFactorDefined | FolderBusFactorUndefined;

export type PrimaryBusFactorRisk = {
  folder: FolderPath;
  busFactor: number;
  totalWeight: number;
};

export type BusFactorSummary = {
  coverageThreshold: number;
  folders: readonly FolderBusFactor[];
  ranking: readonly FolderPath[];
  primaryRisk: PrimaryBusFactorRisk | null;
  repositoryBusFactor: number | null;
};

export type KnowledgeSilo = {
  folder: FolderPath;
  ownerId: ContributorId;
  share: number;
  totalWeight: number;
};

export type MitigationRiskLevel = "critical" | "high" | "medium" | "low" | "none";

export type MitigationAction = {
  priority: number;
  folder: FolderPath;
  ownerId: ContributorId;
  partnerId: ContributorId | null;
  action: "pair_with_next_owner" | "pair_with_active_contributor" | "document_ownership";
};

export type MitigationPlan = {
  riskLevel: MitigationRiskLevel;
  monopolists: readonly ContributorId[];
  exclusiveFolders: ReadonlyArray<{ contributorId: ContributorId; folders: readonly FolderPath[] }>;
  actions: readonly MitigationAction[];
};

export type FolderOwnershipChange = {
  folder: FolderPath;
  busFactorBefore: number | null;
  busFactorAfter: number | null;
  ownersBefore: readonly ContributorId[];
  ownersAfter: readonly ContributorId[];
};

export type ContributorRemovalScenario = {
  removed: readonly ContributorId[];
  matrix: OwnershipMatrix;
  before: BusFactorSummary;
  after: BusFactorSummary;
  orphanedFolders: readonly FolderPath[];
  changedFolders: readonly FolderOwnershipChange[];
  /** In-window files nobody but the removed contributors touched, sorted. */
  orphanedFiles: readonly string[];
  /** Folders holding at least one orphaned file. */
  affectedAreas: readonly FolderPath[];
};

export type FolderDeprecationScenario = {
  folder: FolderPath;
  folderWeight: number;
  affectedContributors: ReadonlyArray<{
    contributorId: ContributorId;
    weightInFolder: number;
    shareOfOwnWeight: number;
  }>;
};

/** Single-contributor removals for the heaviest owners and deprecations of the heaviest folders. */
export type KeyScenarioSet = {
  removals: readonly ContributorRemovalScenario[];
  deprecations: readonly FolderDeprecationScenario[];
};

export type ReviewerStats = {
  reviewerId: ContributorId;
  reviewCount: number;
  reviewedPullRequests: number;
  approvals: number;
  changesRequested: number;
  approvalRate: number;
  meanHoursToFirstReview: number | null;
  medianHoursToFirstReview: number | null;
};

export type ReviewPair = {
  authorId: ContributorId;
  reviewerId: ContributorId;
  pullRequests: number;
};

export type ReviewCultureSummary = {
  pullRequestsInScope: number;
  reviewedPullRequests: number;
  pendingReviewCount: number;
  meanHoursToFirstReview: number | null;
  medianHoursToFirstReview: number | null;
  reviewers: readonly ReviewerStats[];
  pairs: readonly ReviewPair[];
  bottleneckReviewers: readonly ContributorId[];
};

export type BranchCategory = "merged" | "orphan" | "abandoned" | "wip";

export type ClassifiedBranch = {
  name: string;
  category: BranchCategory;
  daysInactive: number;
  aheadBy: number;
  behindBy: number;
  lastActivityAtUnix: number;
};

export type StaleBranchSummary = {
  defaultBranch: string | null;
  inactivityThresholdDays: number;
  branches: readonly ClassifiedBranch[];
  counts: Readonly<Record<BranchCategory, number>>;
  staleBranches: readonly string[];
  deletableBranches: readonly string[];
};

export type ChangelogEntry = {
  category: string;
  scope: string | null;
  breaking: boolean;
  description: string;
  authorId: ContributorId;
  reference: string;
  source: "pull_request" | "commit";
  timestampUnix: number;
};

export type ChangelogGroup = {
  category: string;
  entries: readonly ChangelogEntry[];
};

export type Changelog = {
  groups: readonly ChangelogGroup[];
  entryCount: number;
};

export type WindowMetrics = {
  window: AnalysisWindow;
  contributors: ContributorStatsSummary;
  ownership: OwnershipMatrix;
  busFactor: BusFactorSummary;
  silos: readonly KnowledgeSilo[];
  mitigation: MitigationPlan;
  reviewCulture: ReviewCultureSummary;
  branches: StaleBranchSummary;
  changelog: Changelog;
};

export type NumericDelta = {
  metric: string;
  before: number | null;
  after: number | null;
  delta: number | null;
};

export type MembershipDelta = {
  added: readonly string[];
  removed: readonly string[];
};

export type WindowMetricsDiff = {
  numeric: readonly NumericDelta[];
  contributorCommits: readonly NumericDelta[];
  folderBusFactors: readonly NumericDelta[];
  contributors: MembershipDelta;
  folders: MembershipDelta;
  bottleneckReviewers: MembershipDelta;
  staleBranches: MembershipDelta;
};

export type WindowComparison = {
  earlier: WindowMetrics;
  later: WindowMetrics;
  diff: WindowMetricsDiff;
};

export type AnalysisError =
  | {
      kind: "invalid_configuration";
      message: string;
      issues: readonly string[];
    }
  | {
      kind: "cancelled";
      message: string;
      processedCommits: number;
    };

export type AnalysisSuccess<T> = {
  ok: true;
  empty: boolean;
  window: AnalysisWindow;
  value: T;
};

export type AnalysisFailure = {
  ok: false;
  error: AnalysisError;
};

export type AnalysisOutcome<T> = AnalysisSuccess<T> | AnalysisFailure;

export class InvalidConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`invalid analysis configuration: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class AnalysisCancelledError extends Error {
  readonly processedCommits: number;

  constructor(processedCommits: number) {
    super(`analysis cancelled after ${processedCommits} commits`);
    this.name = "AnalysisCancelledError";
    this.processedCommits = processedCommits;
  }
}

export const throwIfCancelled = (signal: AbortSignal | undefined, processedCommits: number): void => {
  if (signal?.aborted === true) {
    throw new AnalysisCancelledError(processedCommits);
  }
};
