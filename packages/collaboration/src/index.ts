export { computeContributorStats } from "./domain/contributor-stats.js";
export { computeReviewCulture } from "./domain/review-culture.js";
export { classifyBranches } from "./domain/stale-branches.js";
export { parseConventionalSubject, synthesizeChangelog } from "./domain/changelog.js";
export { average, median } from "./domain/math.js";
export {
  DEFAULT_CATEGORY_PREFIXES,
  DEFAULT_COLLABORATION_CONFIG,
  type CancellationOptions,
  type ChangelogConfig,
  type CollaborationConfig,
  type ContributorStatsConfig,
  type ReviewCultureConfig,
  type StaleBranchConfig,
} from "./domain/collaboration-types.js";
