import type { FileChange } from "@collabscope/core";
import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";
import type { ClonedCommit } from "../domain/raw-records.js";

export type ParseGitLogProgressEvent = {
  parsedRecords: number;
  totalRecords: number;
};

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

const parseRenamedPath = (pathSpec: string): string => {
  if (!pathSpec.includes(" => ")) {
    return pathSpec;
  }

  const braceRenameMatch = pathSpec.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braceRenameMatch !== null) {
    const [, prefix = "", , renamedTo = "", suffix = ""] = braceRenameMatch;
    return `${prefix}${renamedTo}${suffix}`.replace(/\/{2,}/g, "/");
  }

  const parts = pathSpec.split(" => ");
  return parts[parts.length - 1] ?? pathSpec;
};

const parseNumstatLine = (line: string): FileChange | null => {
  const parts = line.split("\t");
  if (parts.length < 3) {
    return null;
  }

  const [additionsRaw, deletionsRaw] = parts;
  if (additionsRaw === undefined || deletionsRaw === undefined) {
    return null;
  }

  // binary files report "-" for both columns
  const additions = additionsRaw === "-" ? 0 : parseInteger(additionsRaw);
  const deletions = deletionsRaw === "-" ? 0 : parseInteger(deletionsRaw);
  if (additions === null || deletions === null) {
    return null;
  }

  return {
    filePath: parseRenamedPath(parts.slice(2).join("\t")),
    additions,
    deletions,
  };
};

export const parseGitLog = (
  rawLog: string,
  onProgress?: (event: ParseGitLogProgressEvent) => void,
): readonly ClonedCommit[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);

  const commits: ClonedCommit[] = [];

  for (const [index, record] of records.entries()) {
    onProgress?.({ parsedRecords: index + 1, totalRecords: records.length });

    const lines = record
      .split("\n")
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0);

    const headerParts = lines[0]?.split(COMMIT_FIELD_SEPARATOR) ?? [];
    if (headerParts.length < 5) {
      continue;
    }

    const [sha, committedAtRaw, authorName, authorEmail, ...subjectParts] = headerParts;
    if (sha === undefined || committedAtRaw === undefined || authorName === undefined || authorEmail === undefined) {
      continue;
    }

    const committedAtUnix = parseInteger(committedAtRaw);
    if (committedAtUnix === null) {
      continue;
    }

    const fileChanges: FileChange[] = [];
    for (const line of lines.slice(1)) {
      const parsedLine = parseNumstatLine(line);
      if (parsedLine !== null) {
        fileChanges.push(parsedLine);
      }
    }

    commits.push({
      sha,
      authorName,
      authorEmail,
      committedAtUnix,
      subject: subjectParts.join(COMMIT_FIELD_SEPARATOR).trim(),
      fileChanges,
    });
  }

  commits.sort((a, b) => a.committedAtUnix - b.committedAtUnix || a.sha.localeCompare(b.sha));
  return commits;
};
