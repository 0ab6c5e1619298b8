import type { AnalysisWindow, FolderPath, NormalizedHistory } from "@collabscope/core";
import {
  simulateDeprecation,
  simulateKeyScenariosFor,
  simulateWhatIf,
  type AnalysisOptionsOverrides,
} from "@collabscope/engine";
import { commandFailure, type CommandResult } from "./command-result.js";
import { formatWhatIfOutput, type AnalyzeOutputMode, type WhatIfResult } from "./format-analyze-output.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { createAnalysisProgressReporter } from "./progress.js";

export type WhatIfCommandOptions = {
  window: AnalysisWindow;
  overrides: AnalysisOptionsOverrides;
  remove: readonly string[];
  deprecateFolder?: FolderPath;
  output: AnalyzeOutputMode;
};

/** Without `--remove` or `--deprecate`, simulates the heaviest owners and folders instead. */
export const runWhatIfCommand = (
  history: NormalizedHistory,
  options: WhatIfCommandOptions,
  logger: Logger = createSilentLogger(),
): CommandResult => {
  const control = { onProgress: createAnalysisProgressReporter(logger) };

  if (options.remove.length === 0 && options.deprecateFolder === undefined) {
    logger.info("what-if: no scenario given, simulating the top owners and folders");
    const outcome = simulateKeyScenariosFor(history, options.window, options.overrides, control);
    if (!outcome.ok) {
      return commandFailure(outcome);
    }

    return {
      ok: true,
      empty: outcome.empty,
      rendered: formatWhatIfOutput({ keyScenarios: outcome.value }, options.output),
    };
  }

  let result: WhatIfResult = {};
  let empty = true;

  if (options.remove.length > 0) {
    logger.info(`what-if: removing ${options.remove.join(", ")}`);
    const outcome = simulateWhatIf(history, options.window, options.remove, options.overrides, control);
    if (!outcome.ok) {
      return commandFailure(outcome);
    }
    result = { ...result, removal: outcome.value };
    empty = empty && outcome.empty;
  }

  if (options.deprecateFolder !== undefined) {
    logger.info(`what-if: deprecating ${options.deprecateFolder}`);
    const outcome = simulateDeprecation(history, options.window, options.deprecateFolder, options.overrides, control);
    if (!outcome.ok) {
      return commandFailure(outcome);
    }
    result = { ...result, deprecation: outcome.value };
    empty = empty && outcome.empty;
  }

  return { ok: true, empty, rendered: formatWhatIfOutput(result, options.output) };
};
