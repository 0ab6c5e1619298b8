import type { AnalysisWindow, NormalizedHistory } from "@collabscope/core";
import { computeChangelog, type AnalysisOptionsOverrides } from "@collabscope/engine";
import { renderChangelogMarkdown } from "@collabscope/reporter";
import { commandFailure, type CommandResult } from "./command-result.js";
import { createSilentLogger, type Logger } from "./logger.js";

export type ChangelogFormat = "md" | "json";

export type ChangelogCommandOptions = {
  window: AnalysisWindow;
  overrides: AnalysisOptionsOverrides;
  format: ChangelogFormat;
  title?: string;
};

export const runChangelogCommand = (
  history: NormalizedHistory,
  options: ChangelogCommandOptions,
  logger: Logger = createSilentLogger(),
): CommandResult => {
  const outcome = computeChangelog(history, options.window, options.overrides);
  if (!outcome.ok) {
    return commandFailure(outcome);
  }

  logger.info(`changelog: ${outcome.value.entryCount} entries`);
  const rendered =
    options.format === "json"
      ? JSON.stringify(outcome.value, null, 2)
      : renderChangelogMarkdown(outcome.value, options.title);

  return { ok: true, empty: outcome.empty, rendered };
};
