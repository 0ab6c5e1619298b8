import { writeFile } from "node:fs/promises";
import type { AnalysisWindow, NormalizedHistory } from "@collabscope/core";
import { analyzeWindow, resolveAnalysisOptions, type AnalysisOptionsOverrides } from "@collabscope/engine";
import { createSnapshot, serializeSnapshot } from "@collabscope/reporter";
import { commandFailure, type CommandResult } from "./command-result.js";
import { formatAnalyzeOutput, type AnalyzeOutputMode } from "./format-analyze-output.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { createAnalysisProgressReporter } from "./progress.js";

export type AnalyzeCommandOptions = {
  window: AnalysisWindow;
  overrides: AnalysisOptionsOverrides;
  repository: string;
  output: AnalyzeOutputMode;
  snapshotPath?: string;
};

export const runAnalyzeCommand = async (
  history: NormalizedHistory,
  options: AnalyzeCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<CommandResult> => {
  logger.info(`analyzing ${options.repository}`);
  const outcome = analyzeWindow(history, options.window, options.overrides, {
    onProgress: createAnalysisProgressReporter(logger),
  });
  if (!outcome.ok) {
    return commandFailure(outcome);
  }

  if (options.snapshotPath !== undefined) {
    const snapshot = createSnapshot({
      metrics: outcome.value,
      repository: options.repository,
      analysisOptions: resolveAnalysisOptions(options.overrides),
    });
    await writeFile(options.snapshotPath, serializeSnapshot(snapshot), "utf8");
    logger.info(`snapshot written: ${options.snapshotPath}`);
  }

  return { ok: true, empty: outcome.empty, rendered: formatAnalyzeOutput(outcome.value, options.output) };
};
