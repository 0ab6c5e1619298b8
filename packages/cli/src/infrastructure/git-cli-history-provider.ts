import {
  GIT_LOG_FORMAT,
  mapParseProgressToHistoryProgress,
  parseGitLog,
  type ClonedCommit,
  type GitHistoryProgressEvent,
  type GitHistoryProvider,
} from "@collabscope/history";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NOT_A_REPOSITORY = ["not a git repository", "not in a git directory"];

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NOT_A_REPOSITORY.some((fragment) => lower.includes(fragment));
};

export const GIT_LOG_ARGS: readonly string[] = [
  "-c",
  "core.quotepath=false",
  "log",
  "--use-mailmap",
  "--no-merges",
  "--date=unix",
  `--pretty=format:${GIT_LOG_FORMAT}`,
  "--numstat",
  "--find-renames",
];

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(repositoryPath: string): boolean {
    try {
      return this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]).trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  getCommitHistory(
    repositoryPath: string,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly ClonedCommit[] {
    const output = this.gitClient.run(repositoryPath, GIT_LOG_ARGS);
    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const commits = parseGitLog(output, (event) => onProgress?.(mapParseProgressToHistoryProgress(event)));
    onProgress?.({ stage: "git_log_parsed", commits: commits.length });
    return commits;
  }
}
