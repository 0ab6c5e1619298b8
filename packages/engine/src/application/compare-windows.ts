import type { AnalysisOutcome, AnalysisWindow, NormalizedHistory, WindowComparison } from "@collabscope/core";
import { assertOrderedWindows, type AnalysisOptionsOverrides } from "../domain/analysis-options.js";
import { diffWindowMetrics } from "../domain/window-diff.js";
import { computeWindowMetrics, isEmptyWindow } from "./analyze-window.js";
import { runAnalysis, type AnalysisControl } from "./run-analysis.js";

/** Runs the full metric set on two disjoint windows and diffs them, earlier → later. */
export const compareWindows = (
  history: NormalizedHistory,
  earlier: AnalysisWindow,
  later: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<WindowComparison> =>
  runAnalysis({
    window: { startUnix: earlier.startUnix, endUnix: later.endUnix },
    overrides,
    control,
    validate: () => assertOrderedWindows(earlier, later),
    compute: (options) => {
      const earlierMetrics = computeWindowMetrics(history, earlier, options, control);
      const laterMetrics = computeWindowMetrics(history, later, options, control);
      return {
        earlier: earlierMetrics,
        later: laterMetrics,
        diff: diffWindowMetrics(earlierMetrics, laterMetrics),
      };
    },
    isEmpty: (comparison) => isEmptyWindow(comparison.earlier) && isEmptyWindow(comparison.later),
  });
