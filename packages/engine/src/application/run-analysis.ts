import {
  AnalysisCancelledError,
  InvalidConfigurationError,
  throwIfCancelled,
  type AnalysisFailure,
  type AnalysisOutcome,
  type AnalysisWindow,
} from "@collabscope/core";
import {
  assertValidWindow,
  resolveAnalysisOptions,
  type AnalysisOptions,
  type AnalysisOptionsOverrides,
} from "../domain/analysis-options.js";

export type AnalysisProgressEvent =
  | { stage: "options_resolved" }
  | { stage: "metric_started"; metric: string }
  | { stage: "metric_computed"; metric: string }
  | { stage: "commits_processed"; metric: string; processedCommits: number; totalCommits: number }
  | { stage: "analysis_completed"; empty: boolean };

export type AnalysisControl = {
  signal?: AbortSignal;
  onProgress?: (event: AnalysisProgressEvent) => void;
};

export const toAnalysisFailure = (error: unknown): AnalysisFailure | null => {
  if (error instanceof InvalidConfigurationError) {
    return {
      ok: false,
      error: { kind: "invalid_configuration", message: error.message, issues: error.issues },
    };
  }

  if (error instanceof AnalysisCancelledError) {
    return {
      ok: false,
      error: { kind: "cancelled", message: error.message, processedCommits: error.processedCommits },
    };
  }

  return null;
};

type AnalysisRun<T> = {
  window: AnalysisWindow;
  overrides: AnalysisOptionsOverrides | undefined;
  control: AnalysisControl | undefined;
  validate?: () => void;
  compute: (options: AnalysisOptions) => T;
  isEmpty: (value: T) => boolean;
};

/**
 * Shared call contract: options and windows are validated before any work,
 * expected failures become `ok: false` and anything else propagates.
 */
export const runAnalysis = <T>(run: AnalysisRun<T>): AnalysisOutcome<T> => {
  try {
    const options = resolveAnalysisOptions(run.overrides);
    if (run.validate === undefined) {
      assertValidWindow(run.window);
    } else {
      run.validate();
    }
    run.control?.onProgress?.({ stage: "options_resolved" });
    throwIfCancelled(run.control?.signal, 0);

    const value = run.compute(options);
    const empty = run.isEmpty(value);
    run.control?.onProgress?.({ stage: "analysis_completed", empty });
    return { ok: true, empty, window: run.window, value };
  } catch (error) {
    const failure = toAnalysisFailure(error);
    if (failure === null) {
      throw error;
    }

    return failure;
  }
};
