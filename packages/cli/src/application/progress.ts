import type { AnalysisProgressEvent } from "@collabscope/engine";
import type { GitHistoryProgressEvent, NormalizeProgressEvent } from "@collabscope/history";
import type { Logger } from "./logger.js";

const percent = (done: number, total: number): number => (total === 0 ? 100 : Math.floor((done / total) * 100));

export const createGitProgressReporter = (logger: Logger): ((event: GitHistoryProgressEvent) => void) => {
  let lastParsedRecords = 0;

  return (event) => {
    switch (event.stage) {
      case "git_log_received":
        logger.info(`git: log loaded (${event.bytes} bytes)`);
        break;
      case "git_log_parse_progress":
        if (
          event.parsedRecords === event.totalRecords ||
          event.parsedRecords === 1 ||
          event.parsedRecords - lastParsedRecords >= 500
        ) {
          lastParsedRecords = event.parsedRecords;
          logger.debug(
            `git: parse progress ${event.parsedRecords}/${event.totalRecords} (${percent(event.parsedRecords, event.totalRecords)}%)`,
          );
        }
        break;
      case "git_log_parsed":
        logger.info(`git: parsed ${event.commits} commits`);
        break;
    }
  };
};

export const createNormalizeProgressReporter = (logger: Logger): ((event: NormalizeProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "records_received":
        logger.debug(
          `history: received commits=${event.commits} pullRequests=${event.pullRequests} issues=${event.issues} branches=${event.branches}`,
        );
        break;
      case "cloned_commits_merged":
        logger.info(`history: clone filled ${event.filled} commits and added ${event.added}`);
        break;
      case "history_normalized":
        logger.info(
          `history: normalized commits=${event.commits} pullRequests=${event.pullRequests} issues=${event.issues} branches=${event.branches}`,
        );
        if (event.skipped > 0) {
          logger.warn(`history: skipped ${event.skipped} malformed records`);
        }
        break;
    }
  };
};

export const createAnalysisProgressReporter = (logger: Logger): ((event: AnalysisProgressEvent) => void) => {
  let lastProcessed = 0;

  return (event) => {
    switch (event.stage) {
      case "options_resolved":
        logger.debug("analysis: options resolved");
        break;
      case "metric_started":
        logger.debug(`analysis: computing ${event.metric}`);
        break;
      case "commits_processed":
        if (
          event.processedCommits === event.totalCommits ||
          event.processedCommits - lastProcessed >= 1000
        ) {
          lastProcessed = event.processedCommits;
          logger.debug(
            `analysis: ${event.metric} ${event.processedCommits}/${event.totalCommits} commits (${percent(event.processedCommits, event.totalCommits)}%)`,
          );
        }
        break;
      case "metric_computed":
        logger.info(`analysis: ${event.metric} computed`);
        break;
      case "analysis_completed":
        logger.debug(`analysis: completed (empty=${event.empty})`);
        break;
    }
  };
};
