export type ContributorStatsConfig = {
  folderDepth: number;
};

export type ReviewCultureConfig = {
  /** Share of the busiest reviewers eligible as bottlenecks; at least one reviewer always is. */
  bottleneckPercentile: number;
};

export type StaleBranchConfig = {
  inactivityThresholdDays: number;
};

export type ChangelogConfig = {
  /** Lower-cased conventional-commit type → changelog category. */
  categoryPrefixes: Readonly<Record<string, string>>;
};

export type CollaborationConfig = ContributorStatsConfig & ReviewCultureConfig & StaleBranchConfig & ChangelogConfig;

export const DEFAULT_CATEGORY_PREFIXES: Readonly<Record<string, string>> = {
  feat: "feat",
  feature: "feat",
  fix: "fix",
  bugfix: "fix",
  hotfix: "fix",
  docs: "docs",
  chore: "chore",
  refactor: "refactor",
  perf: "perf",
  test: "test",
  ci: "ci",
  build: "build",
  style: "style",
  revert: "revert",
};

export const DEFAULT_COLLABORATION_CONFIG: CollaborationConfig = {
  folderDepth: 2,
  bottleneckPercentile: 0.2,
  inactivityThresholdDays: 60,
  categoryPrefixes: DEFAULT_CATEGORY_PREFIXES,
};

export type CancellationOptions = {
  signal?: AbortSignal;
};
