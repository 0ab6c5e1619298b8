import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { NormalizedHistory } from "@collabscope/core";
import { normalizeHistory, type GitHistoryProvider, type RawHistoryInput } from "@collabscope/history";
import { z } from "zod";
import { CliInputError } from "./cli-options.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { createGitProgressReporter, createNormalizeProgressReporter } from "./progress.js";

// Records stay `unknown`; the normalizer validates each one separately.
const historyDumpSchema = z.object({
  commits: z.array(z.unknown()).optional(),
  pullRequests: z.array(z.unknown()).optional(),
  issues: z.array(z.unknown()).optional(),
  branches: z.array(z.unknown()).optional(),
  defaultBranch: z.unknown().optional(),
  pagination: z.enum(["complete", "partial"]).optional(),
});

export const parseHistoryDump = (raw: string, source: string): RawHistoryInput => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown parse error";
    throw new CliInputError(`${source}: invalid JSON (${reason})`);
  }

  const parsed = historyDumpSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue === undefined ? "unexpected shape" : `${issue.path.join(".") || "dump"}: ${issue.message}`;
    throw new CliInputError(`${source}: not a history dump (${detail})`);
  }

  const dump = parsed.data;
  return {
    commits: dump.commits ?? [],
    pullRequests: dump.pullRequests ?? [],
    issues: dump.issues ?? [],
    branches: dump.branches ?? [],
    ...(dump.defaultBranch === undefined ? {} : { defaultBranch: dump.defaultBranch }),
    ...(dump.pagination === undefined ? {} : { pagination: dump.pagination }),
  };
};

export type LoadHistoryOptions = {
  inputPath: string;
  repositoryPath?: string;
  gitProvider?: GitHistoryProvider;
};

const readDump = async (path: string): Promise<string> => {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown read error";
    throw new CliInputError(`cannot read ${path}: ${reason}`);
  }
};

export const loadHistory = async (
  options: LoadHistoryOptions,
  logger: Logger = createSilentLogger(),
): Promise<NormalizedHistory> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const inputPath = resolve(invocationCwd, options.inputPath);
  logger.info(`loading history dump: ${inputPath}`);
  const input = parseHistoryDump(await readDump(inputPath), inputPath);

  if (options.repositoryPath !== undefined && options.gitProvider !== undefined) {
    const repositoryPath = resolve(invocationCwd, options.repositoryPath);
    if (options.gitProvider.isGitRepository(repositoryPath)) {
      logger.info(`reading local clone: ${repositoryPath}`);
      const clonedCommits = options.gitProvider.getCommitHistory(repositoryPath, createGitProgressReporter(logger));
      return normalizeHistory({ ...input, clonedCommits }, createNormalizeProgressReporter(logger));
    }

    logger.warn(`not a git repository, ignoring --repo: ${repositoryPath}`);
  }

  return normalizeHistory(input, createNormalizeProgressReporter(logger));
};
