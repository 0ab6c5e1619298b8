import { InvalidConfigurationError, type AnalysisWindow } from "@collabscope/core";
import { DEFAULT_COLLABORATION_CONFIG } from "@collabscope/collaboration";
import { DEFAULT_OWNERSHIP_CONFIG } from "@collabscope/ownership";
import { z } from "zod";

export const analysisOptionsSchema = z
  .object({
    decayHalfLifeDays: z.number().positive().finite().nullable(),
    folderDepth: z.number().int().min(1),
    coverageThreshold: z.number().min(0).max(1),
    bottleneckPercentile: z.number().gt(0).max(1),
    inactivityThresholdDays: z.number().min(0).finite(),
    categoryPrefixes: z
      .record(z.string().min(1), z.string().min(1))
      .refine((prefixes) => Object.keys(prefixes).length > 0, "must map at least one prefix"),
    siloShareThreshold: z.number().gt(0).max(1),
    referenceTimeUnix: z.number().finite().nullable(),
  })
  .strict();

export type AnalysisOptions = z.infer<typeof analysisOptionsSchema>;

export type AnalysisOptionsOverrides = Partial<AnalysisOptions>;

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  decayHalfLifeDays: DEFAULT_OWNERSHIP_CONFIG.decayHalfLifeDays,
  folderDepth: DEFAULT_OWNERSHIP_CONFIG.folderDepth,
  coverageThreshold: DEFAULT_OWNERSHIP_CONFIG.coverageThreshold,
  bottleneckPercentile: DEFAULT_COLLABORATION_CONFIG.bottleneckPercentile,
  inactivityThresholdDays: DEFAULT_COLLABORATION_CONFIG.inactivityThresholdDays,
  categoryPrefixes: DEFAULT_COLLABORATION_CONFIG.categoryPrefixes,
  siloShareThreshold: DEFAULT_OWNERSHIP_CONFIG.siloShareThreshold,
  referenceTimeUnix: DEFAULT_OWNERSHIP_CONFIG.referenceTimeUnix,
};

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.length === 0 ? "options" : issue.path.join(".");
  return `${path}: ${issue.message}`;
};

/** Merges overrides onto the defaults; throws `InvalidConfigurationError` listing every violated constraint. */
export const resolveAnalysisOptions = (overrides: AnalysisOptionsOverrides = {}): AnalysisOptions => {
  const parsed = analysisOptionsSchema.safeParse({ ...DEFAULT_ANALYSIS_OPTIONS, ...overrides });
  if (!parsed.success) {
    throw new InvalidConfigurationError(parsed.error.issues.map(formatIssue));
  }

  return parsed.data;
};

export const windowIssues = (window: AnalysisWindow, label = "window"): readonly string[] => {
  if (!Number.isFinite(window.startUnix) || !Number.isFinite(window.endUnix)) {
    return [`${label}: bounds must be finite`];
  }
  if (window.startUnix >= window.endUnix) {
    return [`${label}: start must be before end`];
  }

  return [];
};

export const assertValidWindow = (window: AnalysisWindow, label?: string): void => {
  const issues = windowIssues(window, label);
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
};

export const assertOrderedWindows = (earlier: AnalysisWindow, later: AnalysisWindow): void => {
  const issues = [...windowIssues(earlier, "earlier"), ...windowIssues(later, "later")];
  if (issues.length === 0 && earlier.endUnix > later.startUnix) {
    issues.push("windows must not overlap: earlier must end before later starts");
  }
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }
};
