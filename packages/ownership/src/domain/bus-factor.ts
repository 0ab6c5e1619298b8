import {
  round4,
  type BusFactorSummary,
  type FolderBusFactor,
  type FolderBusFactorDefined,
  type FolderOwner,
  type FolderPath,
  type OwnershipMatrix,
} from "@collabscope/core";
import { contributorTotals, groupCellsByFolder } from "./knowledge-map.js";
import type { BusFactorConfig } from "./ownership-types.js";

type WeightedContributor = {
  contributorId: string;
  weight: number;
};

/**
 * Size of the smallest prefix of `ranked` (heaviest first) whose cumulative
 * weight reaches `threshold` of the total. The total is summed in the same
 * order as the prefix so a threshold of 1 is reached exactly at the last entry.
 */
const minimalCoverageSize = (ranked: readonly WeightedContributor[], threshold: number): number => {
  const total = ranked.reduce((sum, entry) => sum + entry.weight, 0);
  const required = threshold * total;

  let covered = 0;
  for (const [index, entry] of ranked.entries()) {
    covered += entry.weight;
    if (covered >= required) {
      return index + 1;
    }
  }

  return ranked.length;
};

const toOwners = (ranked: readonly WeightedContributor[], totalWeight: number): readonly FolderOwner[] =>
  ranked.map((entry) => ({
    contributorId: entry.contributorId,
    weight: round4(entry.weight),
    share: round4(entry.weight / totalWeight),
  }));

const rankFolders = (folders: readonly FolderBusFactor[]): readonly FolderBusFactorDefined[] =>
  folders
    .filter((folder): folder is FolderBusFactorDefined => folder.status === "defined")
    .sort((a, b) => a.busFactor - b.busFactor || b.totalWeight - a.totalWeight || a.folder.localeCompare(b.folder));

export const computeBusFactor = (
  matrix: OwnershipMatrix,
  config: BusFactorConfig & { folders?: readonly FolderPath[] },
): BusFactorSummary => {
  const grouped = groupCellsByFolder(matrix);
  const folderNames = [...new Set([...grouped.keys(), ...(config.folders ?? [])])].sort((a, b) => a.localeCompare(b));

  const folders = folderNames.map((folder): FolderBusFactor => {
    const ranked = grouped.get(folder) ?? [];
    const totalWeight = ranked.reduce((sum, cell) => sum + cell.weight, 0);
    if (ranked.length === 0 || totalWeight <= 0) {
      return { folder, status: "undefined", reason: "zero_total_weight" };
    }

    const busFactor = minimalCoverageSize(ranked, config.coverageThreshold);
    const owners = toOwners(ranked, totalWeight);
    return {
      folder,
      status: "defined",
      busFactor,
      totalWeight: round4(totalWeight),
      riskSet: owners.slice(0, busFactor),
      owners,
    };
  });

  const ranking = rankFolders(folders);
  const primary = ranking[0];

  const repositoryRanked = [...contributorTotals(matrix).entries()]
    .map(([contributorId, weight]) => ({ contributorId, weight }))
    .sort((a, b) => b.weight - a.weight || a.contributorId.localeCompare(b.contributorId));

  return {
    coverageThreshold: config.coverageThreshold,
    folders,
    ranking: ranking.map((folder) => folder.folder),
    primaryRisk:
      primary === undefined
        ? null
        : { folder: primary.folder, busFactor: primary.busFactor, totalWeight: primary.totalWeight },
    repositoryBusFactor:
      repositoryRanked.length === 0 ? null : minimalCoverageSize(repositoryRanked, config.coverageThreshold),
  };
};
