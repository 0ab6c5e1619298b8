export {
  DEFAULT_ANALYSIS_OPTIONS,
  analysisOptionsSchema,
  assertOrderedWindows,
  assertValidWindow,
  resolveAnalysisOptions,
  windowIssues,
  type AnalysisOptions,
  type AnalysisOptionsOverrides,
} from "./domain/analysis-options.js";
export { diffSets, diffWindowMetrics, numericDelta } from "./domain/window-diff.js";
export {
  runAnalysis,
  toAnalysisFailure,
  type AnalysisControl,
  type AnalysisProgressEvent,
} from "./application/run-analysis.js";
export {
  analyzeWindow,
  computeBusFactor,
  computeChangelog,
  computeContributorStats,
  computeKnowledgeMap,
  computeReviewCulture,
  computeStaleBranches,
  computeWindowMetrics,
  isEmptyWindow,
} from "./application/analyze-window.js";
export { compareWindows } from "./application/compare-windows.js";
export { simulateDeprecation, simulateKeyScenariosFor, simulateWhatIf } from "./application/simulate-what-if.js";
