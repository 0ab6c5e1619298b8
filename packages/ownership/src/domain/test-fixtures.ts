import type { Commit, OwnershipMatrix } from "@collabscope/core";

export const commitAt = (
  sha: string,
  authorId: string,
  committedAtUnix: number,
  files: ReadonlyArray<readonly [string, number, number]>,
): Commit => ({
  sha,
  authorId,
  authorName: authorId,
  committedAtUnix,
  subject: `change ${sha}`,
  fileChanges: files.map(([filePath, additions, deletions]) => ({ filePath, additions, deletions })),
  additions: files.reduce((sum, [, additions]) => sum + additions, 0),
  deletions: files.reduce((sum, [, , deletions]) => sum + deletions, 0),
});

export const matrixOf = (cells: ReadonlyArray<readonly [string, string, number]>): OwnershipMatrix => ({
  folderDepth: 2,
  decayHalfLifeDays: null,
  referenceTimeUnix: 0,
  cells: cells.map(([contributorId, folder, weight]) => ({
    contributorId,
    folder,
    weight,
    commits: 1,
    linesChanged: weight,
  })),
});
