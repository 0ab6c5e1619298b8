import {
  SECONDS_PER_DAY,
  isWithinWindow,
  round4,
  throwIfCancelled,
  toFolderPath,
  type AnalysisWindow,
  type Commit,
  type ContributorId,
  type FolderPath,
  type KnowledgeSilo,
  type OwnershipCell,
  type OwnershipMatrix,
} from "@collabscope/core";
import type { BuildOwnershipMatrixOptions, KnowledgeMapConfig } from "./ownership-types.js";

type CellAccumulator = {
  contributorId: ContributorId;
  folder: FolderPath;
  weight: number;
  commits: number;
  linesChanged: number;
};

const cellKey = (contributorId: ContributorId, folder: FolderPath): string => `${contributorId}\u0000${folder}`;

export const decayFactor = (ageSeconds: number, halfLifeDays: number | null): number => {
  if (halfLifeDays === null) {
    return 1;
  }

  return 0.5 ** (Math.max(0, ageSeconds) / (halfLifeDays * SECONDS_PER_DAY));
};

const linesByFolder = (commit: Commit, folderDepth: number): ReadonlyMap<FolderPath, number> => {
  const result = new Map<FolderPath, number>();
  for (const change of commit.fileChanges) {
    const folder = toFolderPath(change.filePath, folderDepth);
    result.set(folder, (result.get(folder) ?? 0) + change.additions + change.deletions);
  }

  return result;
};

/**
 * Builds the contributor × folder ownership matrix. Each changed line counts
 * once toward its folder, scaled by `0.5 ^ (age / half-life)` so that recent
 * work dominates. Folders without changed lines never get a cell.
 */
export const buildOwnershipMatrix = (
  commits: readonly Commit[],
  window: AnalysisWindow,
  config: KnowledgeMapConfig,
  options: BuildOwnershipMatrixOptions = {},
): OwnershipMatrix => {
  const referenceTimeUnix = config.referenceTimeUnix ?? window.endUnix;
  const inWindow = commits.filter((commit) => isWithinWindow(commit.committedAtUnix, window));
  const cells = new Map<string, CellAccumulator>();

  for (const [index, commit] of inWindow.entries()) {
    throwIfCancelled(options.signal, index);

    const decay = decayFactor(referenceTimeUnix - commit.committedAtUnix, config.decayHalfLifeDays);
    for (const [folder, lines] of linesByFolder(commit, config.folderDepth)) {
      if (lines <= 0) {
        continue;
      }

      const key = cellKey(commit.authorId, folder);
      const current = cells.get(key) ?? {
        contributorId: commit.authorId,
        folder,
        weight: 0,
        commits: 0,
        linesChanged: 0,
      };
      current.weight += decay * lines;
      current.commits += 1;
      current.linesChanged += lines;
      cells.set(key, current);
    }

    options.onProgress?.({ processedCommits: index + 1, totalCommits: inWindow.length });
  }

  return {
    folderDepth: config.folderDepth,
    decayHalfLifeDays: config.decayHalfLifeDays,
    referenceTimeUnix,
    cells: [...cells.values()]
      .filter((cell) => cell.weight > 0)
      .sort((a, b) => a.folder.localeCompare(b.folder) || a.contributorId.localeCompare(b.contributorId)),
  };
};

/** Cells grouped per folder, heaviest contributor first (ties by identity). */
export const groupCellsByFolder = (
  matrix: OwnershipMatrix,
): ReadonlyMap<FolderPath, readonly OwnershipCell[]> => {
  const grouped = new Map<FolderPath, OwnershipCell[]>();
  for (const cell of matrix.cells) {
    const current = grouped.get(cell.folder) ?? [];
    current.push(cell);
    grouped.set(cell.folder, current);
  }

  for (const cells of grouped.values()) {
    cells.sort((a, b) => b.weight - a.weight || a.contributorId.localeCompare(b.contributorId));
  }

  return grouped;
};

export const contributorTotals = (matrix: OwnershipMatrix): ReadonlyMap<ContributorId, number> => {
  const totals = new Map<ContributorId, number>();
  for (const cell of matrix.cells) {
    totals.set(cell.contributorId, (totals.get(cell.contributorId) ?? 0) + cell.weight);
  }

  return totals;
};

export const findKnowledgeSilos = (matrix: OwnershipMatrix, shareThreshold: number): readonly KnowledgeSilo[] => {
  const silos: KnowledgeSilo[] = [];

  for (const [folder, cells] of groupCellsByFolder(matrix)) {
    const top = cells[0];
    const totalWeight = cells.reduce((sum, cell) => sum + cell.weight, 0);
    if (top === undefined || totalWeight <= 0) {
      continue;
    }

    const share = top.weight / totalWeight;
    if (share >= shareThreshold) {
      silos.push({
        folder,
        ownerId: top.contributorId,
        share: round4(share),
        totalWeight: round4(totalWeight),
      });
    }
  }

  return silos.sort((a, b) => b.totalWeight - a.totalWeight || a.folder.localeCompare(b.folder));
};

export const folderTotals = (matrix: OwnershipMatrix): ReadonlyMap<FolderPath, number> => {
  const totals = new Map<FolderPath, number>();
  for (const cell of matrix.cells) {
    totals.set(cell.folder, (totals.get(cell.folder) ?? 0) + cell.weight);
  }

  return totals;
};
