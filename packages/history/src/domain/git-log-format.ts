export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, author timestamp, author name, author email, subject
export const GIT_LOG_FORMAT = "%x1e%H%x1f%at%x1f%an%x1f%ae%x1f%s";
