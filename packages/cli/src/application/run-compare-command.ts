import { readFile } from "node:fs/promises";
import type { AnalysisWindow, NormalizedHistory } from "@collabscope/core";
import { compareWindows, resolveAnalysisOptions, type AnalysisOptionsOverrides } from "@collabscope/engine";
import {
  compareSnapshots,
  createReport,
  createSnapshot,
  formatReport,
  parseSnapshot,
  SnapshotParseError,
  type CollabscopeSnapshot,
  type ReportFormat,
} from "@collabscope/reporter";
import { CliInputError } from "./cli-options.js";
import { commandFailure, type CommandResult } from "./command-result.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { createAnalysisProgressReporter } from "./progress.js";

export type CompareWindowsCommandOptions = {
  baseline: AnalysisWindow;
  current: AnalysisWindow;
  overrides: AnalysisOptionsOverrides;
  repository: string;
  format: ReportFormat;
  generatedAt?: string;
};

export type CompareSnapshotsCommandOptions = {
  baselinePath: string;
  currentPath: string;
  format: ReportFormat;
};

export const runCompareWindowsCommand = (
  history: NormalizedHistory,
  options: CompareWindowsCommandOptions,
  logger: Logger = createSilentLogger(),
): CommandResult => {
  logger.info(`comparing windows of ${options.repository}`);
  const outcome = compareWindows(history, options.baseline, options.current, options.overrides, {
    onProgress: createAnalysisProgressReporter(logger),
  });
  if (!outcome.ok) {
    return commandFailure(outcome);
  }

  const generatedAt = options.generatedAt ?? new Date().toISOString();
  const analysisOptions = resolveAnalysisOptions(options.overrides);
  const current = createSnapshot({
    metrics: outcome.value.later,
    repository: options.repository,
    generatedAt,
    analysisOptions,
  });
  const report = createReport(current, {
    baselineWindow: outcome.value.earlier.window,
    currentWindow: outcome.value.later.window,
    metrics: outcome.value.diff,
  });

  return { ok: true, empty: outcome.empty, rendered: formatReport(report, options.format) };
};

const readSnapshot = async (path: string, logger: Logger): Promise<CollabscopeSnapshot> => {
  logger.info(`loading snapshot: ${path}`);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown read error";
    throw new CliInputError(`cannot read ${path}: ${reason}`);
  }

  try {
    return parseSnapshot(raw);
  } catch (error) {
    if (error instanceof SnapshotParseError) {
      throw new CliInputError(`${path}: ${error.message}`);
    }
    throw error;
  }
};

export const runCompareSnapshotsCommand = async (
  options: CompareSnapshotsCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<CommandResult> => {
  const baseline = await readSnapshot(options.baselinePath, logger);
  const current = await readSnapshot(options.currentPath, logger);
  const report = createReport(current, compareSnapshots(current, baseline));

  return { ok: true, empty: false, rendered: formatReport(report, options.format) };
};
