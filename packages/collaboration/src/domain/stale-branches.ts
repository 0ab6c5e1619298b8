import {
  SECONDS_PER_DAY,
  type AnalysisWindow,
  type Branch,
  type BranchCategory,
  type ClassifiedBranch,
  type DefaultBranch,
  type StaleBranchSummary,
} from "@collabscope/core";
import type { StaleBranchConfig } from "./collaboration-types.js";

const categorize = (
  branch: Branch,
  defaultBranch: DefaultBranch | null,
  inactiveDays: number,
  thresholdDays: number,
): BranchCategory => {
  if (branch.merged || (defaultBranch !== null && branch.headSha === defaultBranch.headSha)) {
    return "merged";
  }

  const inactive = inactiveDays >= thresholdDays;
  if (inactive && branch.aheadBy === 0) {
    return "orphan";
  }
  if (inactive) {
    return "abandoned";
  }

  return "wip";
};

/**
 * Classifies every non-default branch that existed before the window end.
 * Categories are checked in priority order: merged, orphan, abandoned, wip.
 */
export const classifyBranches = (
  branches: readonly Branch[],
  defaultBranch: DefaultBranch | null,
  window: AnalysisWindow,
  config: StaleBranchConfig,
): StaleBranchSummary => {
  const classified: ClassifiedBranch[] = branches
    .filter((branch) => branch.name !== defaultBranch?.name && branch.lastActivityAtUnix < window.endUnix)
    .map((branch) => {
      const inactiveDays = (window.endUnix - branch.lastActivityAtUnix) / SECONDS_PER_DAY;
      return {
        name: branch.name,
        category: categorize(branch, defaultBranch, inactiveDays, config.inactivityThresholdDays),
        daysInactive: Math.floor(inactiveDays),
        aheadBy: branch.aheadBy,
        behindBy: branch.behindBy,
        lastActivityAtUnix: branch.lastActivityAtUnix,
      };
    })
    .sort((a, b) => b.daysInactive - a.daysInactive || a.name.localeCompare(b.name));

  const counts: Record<BranchCategory, number> = { merged: 0, orphan: 0, abandoned: 0, wip: 0 };
  for (const branch of classified) {
    counts[branch.category] += 1;
  }

  return {
    defaultBranch: defaultBranch?.name ?? null,
    inactivityThresholdDays: config.inactivityThresholdDays,
    branches: classified,
    counts,
    staleBranches: classified
      .filter((branch) => branch.category === "orphan" || branch.category === "abandoned")
      .map((branch) => branch.name),
    deletableBranches: classified
      .filter((branch) => branch.category === "merged" || branch.category === "orphan")
      .map((branch) => branch.name),
  };
};
