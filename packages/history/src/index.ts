export {
  normalizeHistory,
  type NormalizeProgressEvent,
} from "./application/normalize-history.js";
export {
  mapParseProgressToHistoryProgress,
  type GitHistoryProgressEvent,
  type GitHistoryProvider,
} from "./application/git-history-provider.js";
export { parseGitLog, type ParseGitLogProgressEvent } from "./parsing/git-log-parser.js";
export { parseTimestamp } from "./parsing/timestamps.js";
export { normalizeIdentity } from "./domain/identity.js";
export { GIT_LOG_FORMAT } from "./domain/git-log-format.js";
export type {
  ClonedCommit,
  RawBranchRecord,
  RawCommitRecord,
  RawHistoryInput,
  RawIssueRecord,
  RawPullRequestRecord,
  RawReviewRecord,
} from "./domain/raw-records.js";
