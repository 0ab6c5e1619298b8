import type {
  AnalysisOutcome,
  AnalysisWindow,
  ContributorId,
  ContributorRemovalScenario,
  FolderDeprecationScenario,
  FolderPath,
  KeyScenarioSet,
  NormalizedHistory,
} from "@collabscope/core";
import {
  collectFileAuthors,
  simulateContributorRemoval,
  simulateFolderDeprecation,
  simulateKeyScenarios,
} from "@collabscope/ownership";
import type { AnalysisOptionsOverrides } from "../domain/analysis-options.js";
import { ownershipMatrixFor } from "./analyze-window.js";
import { runAnalysis, type AnalysisControl } from "./run-analysis.js";

export const simulateWhatIf = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  removed: readonly ContributorId[],
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<ContributorRemovalScenario> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) =>
      simulateContributorRemoval(ownershipMatrixFor(history, window, options, control), removed, {
        coverageThreshold: options.coverageThreshold,
        fileAuthors: collectFileAuthors(history.commits, window),
      }),
    isEmpty: (scenario) => scenario.before.folders.length === 0,
  });

export const simulateDeprecation = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  folder: FolderPath,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<FolderDeprecationScenario> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) => simulateFolderDeprecation(ownershipMatrixFor(history, window, options, control), folder),
    isEmpty: (scenario) => scenario.affectedContributors.length === 0,
  });

/** What-if scenarios for the heaviest owners and folders, for when nobody is named. */
export const simulateKeyScenariosFor = (
  history: NormalizedHistory,
  window: AnalysisWindow,
  overrides?: AnalysisOptionsOverrides,
  control?: AnalysisControl,
): AnalysisOutcome<KeyScenarioSet> =>
  runAnalysis({
    window,
    overrides,
    control,
    compute: (options) =>
      simulateKeyScenarios(ownershipMatrixFor(history, window, options, control), {
        coverageThreshold: options.coverageThreshold,
        fileAuthors: collectFileAuthors(history.commits, window),
      }),
    isEmpty: (scenarios) => scenarios.removals.length === 0 && scenarios.deprecations.length === 0,
  });
