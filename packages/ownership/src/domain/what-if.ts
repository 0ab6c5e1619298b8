import {
  isWithinWindow,
  round4,
  toFolderPath,
  type AnalysisWindow,
  type BusFactorSummary,
  type Commit,
  type ContributorId,
  type ContributorRemovalScenario,
  type FolderBusFactor,
  type FolderDeprecationScenario,
  type FolderOwnershipChange,
  type FolderPath,
  type KeyScenarioSet,
  type OwnershipMatrix,
} from "@collabscope/core";
import { computeBusFactor } from "./bus-factor.js";
import { contributorTotals, folderTotals } from "./knowledge-map.js";
import type { BusFactorConfig } from "./ownership-types.js";

export const KEY_SCENARIO_COUNT = 3;

/** Who touched each file in the window, zero-line changes included. */
export type FileAuthors = ReadonlyMap<string, ReadonlySet<ContributorId>>;

export const collectFileAuthors = (commits: readonly Commit[], window: AnalysisWindow): FileAuthors => {
  const authors = new Map<string, Set<ContributorId>>();
  for (const commit of commits) {
    if (!isWithinWindow(commit.committedAtUnix, window)) {
      continue;
    }

    for (const change of commit.fileChanges) {
      const touchedBy = authors.get(change.filePath) ?? new Set<ContributorId>();
      touchedBy.add(commit.authorId);
      authors.set(change.filePath, touchedBy);
    }
  }

  return authors;
};

export type RemovalConfig = BusFactorConfig & {
  fileAuthors?: FileAuthors;
};

const busFactorOf = (folder: FolderBusFactor | undefined): number | null =>
  folder?.status === "defined" ? folder.busFactor : null;

const ownerIdsOf = (folder: FolderBusFactor | undefined): readonly ContributorId[] =>
  folder?.status === "defined" ? folder.owners.map((owner) => owner.contributorId) : [];

const sameIds = (left: readonly string[], right: readonly string[]): boolean =>
  left.length === right.length && left.every((value, index) => value === right[index]);

const diffFolders = (
  before: BusFactorSummary,
  after: BusFactorSummary,
): { orphanedFolders: FolderPath[]; changedFolders: FolderOwnershipChange[] } => {
  const afterByFolder = new Map(after.folders.map((folder) => [folder.folder, folder] as const));
  const orphanedFolders: FolderPath[] = [];
  const changedFolders: FolderOwnershipChange[] = [];

  for (const folderBefore of before.folders) {
    const folderAfter = afterByFolder.get(folderBefore.folder);
    const change: FolderOwnershipChange = {
      folder: folderBefore.folder,
      busFactorBefore: busFactorOf(folderBefore),
      busFactorAfter: busFactorOf(folderAfter),
      ownersBefore: ownerIdsOf(folderBefore),
      ownersAfter: ownerIdsOf(folderAfter),
    };

    if (change.busFactorBefore !== null && change.busFactorAfter === null) {
      orphanedFolders.push(folderBefore.folder);
    }
    if (change.busFactorBefore !== change.busFactorAfter || !sameIds(change.ownersBefore, change.ownersAfter)) {
      changedFolders.push(change);
    }
  }

  return { orphanedFolders, changedFolders };
};

/**
 * Recomputes bus factors as if `removed` had never contributed. The folder
 * set of the input matrix is kept, so folders only the removed contributors
 * touched come back as `undefined` rather than disappearing.
 */
export const simulateContributorRemoval = (
  matrix: OwnershipMatrix,
  removed: readonly ContributorId[],
  config: RemovalConfig,
): ContributorRemovalScenario => {
  const removedIds = [...new Set(removed)].sort((a, b) => a.localeCompare(b));
  const removedSet = new Set(removedIds);

  const before = computeBusFactor(matrix, { coverageThreshold: config.coverageThreshold });
  const folders = before.folders.map((folder) => folder.folder);
  const remaining: OwnershipMatrix = {
    ...matrix,
    cells: matrix.cells.filter((cell) => !removedSet.has(cell.contributorId)),
  };
  const after = computeBusFactor(remaining, { coverageThreshold: config.coverageThreshold, folders });
  const orphanedFiles = [...(config.fileAuthors ?? new Map<string, ReadonlySet<ContributorId>>())]
    .filter(([, authors]) => [...authors].every((authorId) => removedSet.has(authorId)))
    .map(([filePath]) => filePath)
    .sort((a, b) => a.localeCompare(b));
  const affectedAreas = [...new Set(orphanedFiles.map((filePath) => toFolderPath(filePath, matrix.folderDepth)))];

  return {
    removed: removedIds,
    matrix: remaining,
    before,
    after,
    ...diffFolders(before, after),
    orphanedFiles,
    affectedAreas: affectedAreas.sort((a, b) => a.localeCompare(b)),
  };
};

const isWithinFolder = (candidate: FolderPath, folder: FolderPath): boolean =>
  candidate === folder || candidate.startsWith(`${folder}/`);

/** Who loses how much of their footprint when `folder` (and everything below it) goes away. */
export const simulateFolderDeprecation = (matrix: OwnershipMatrix, folder: FolderPath): FolderDeprecationScenario => {
  const totals = contributorTotals(matrix);
  const inFolder = new Map<ContributorId, number>();
  for (const cell of matrix.cells) {
    if (isWithinFolder(cell.folder, folder)) {
      inFolder.set(cell.contributorId, (inFolder.get(cell.contributorId) ?? 0) + cell.weight);
    }
  }

  const folderWeight = [...inFolder.values()].reduce((sum, weight) => sum + weight, 0);

  return {
    folder,
    folderWeight: round4(folderWeight),
    affectedContributors: [...inFolder.entries()]
      .map(([contributorId, weightInFolder]) => ({
        contributorId,
        weightInFolder: round4(weightInFolder),
        shareOfOwnWeight: round4(weightInFolder / (totals.get(contributorId) ?? weightInFolder)),
      }))
      .sort((a, b) => b.weightInFolder - a.weightInFolder || a.contributorId.localeCompare(b.contributorId)),
  };
};

const heaviest = <T extends string>(totals: ReadonlyMap<T, number>, limit: number): readonly T[] =>
  [...totals.entries()]
    .filter(([, weight]) => weight > 0)
    .sort(([leftId, left], [rightId, right]) => right - left || leftId.localeCompare(rightId))
    .slice(0, limit)
    .map(([id]) => id);

/**
 * Removes each of the `limit` heaviest owners on their own and deprecates
 * each of the `limit` heaviest folders.
 */
export const simulateKeyScenarios = (
  matrix: OwnershipMatrix,
  config: RemovalConfig,
  limit: number = KEY_SCENARIO_COUNT,
): KeyScenarioSet => ({
  removals: heaviest(contributorTotals(matrix), limit).map((contributorId) =>
    simulateContributorRemoval(matrix, [contributorId], config),
  ),
  deprecations: heaviest(folderTotals(matrix), limit).map((folder) => simulateFolderDeprecation(matrix, folder)),
});
