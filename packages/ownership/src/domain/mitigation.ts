import type {
  BusFactorSummary,
  ContributorId,
  FolderBusFactorDefined,
  FolderPath,
  MitigationAction,
  MitigationPlan,
  MitigationRiskLevel,
  OwnershipMatrix,
} from "@collabscope/core";
import { contributorTotals } from "./knowledge-map.js";

export const riskLevelForBusFactor = (busFactor: number | null): MitigationRiskLevel => {
  if (busFactor === null) {
    return "none";
  }
  if (busFactor <= 1) {
    return "critical";
  }
  if (busFactor <= 2) {
    return "high";
  }
  if (busFactor <= 3) {
    return "medium";
  }
  return "low";
};

const definedFolders = (summary: BusFactorSummary): readonly FolderBusFactorDefined[] =>
  summary.folders.filter((folder): folder is FolderBusFactorDefined => folder.status === "defined");

const collectExclusiveFolders = (
  folders: readonly FolderBusFactorDefined[],
): MitigationPlan["exclusiveFolders"] => {
  const byOwner = new Map<ContributorId, FolderPath[]>();
  for (const folder of folders) {
    const [soleOwner, ...others] = folder.owners;
    if (soleOwner === undefined || others.length > 0) {
      continue;
    }

    const current = byOwner.get(soleOwner.contributorId) ?? [];
    current.push(folder.folder);
    byOwner.set(soleOwner.contributorId, current);
  }

  return [...byOwner.entries()]
    .map(([contributorId, owned]) => ({ contributorId, folders: [...owned].sort((a, b) => a.localeCompare(b)) }))
    .sort((a, b) => a.contributorId.localeCompare(b.contributorId));
};

/**
 * Turns bus-factor findings into an ordered list of pairing actions.
 * Every single-owner-risk folder gets one action, heaviest folder first.
 */
export const buildMitigationPlan = (matrix: OwnershipMatrix, summary: BusFactorSummary): MitigationPlan => {
  const folders = definedFolders(summary);

  const monopolists = [
    ...new Set(
      folders.flatMap((folder) => (folder.busFactor === 1 ? folder.riskSet.map((owner) => owner.contributorId) : [])),
    ),
  ].sort((a, b) => a.localeCompare(b));

  const activeContributors = [...contributorTotals(matrix).entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([contributorId]) => contributorId);

  const critical = folders
    .filter((folder) => folder.busFactor === 1)
    .sort((a, b) => b.totalWeight - a.totalWeight || a.folder.localeCompare(b.folder));

  const actions: MitigationAction[] = [];
  for (const folder of critical) {
    const owner = folder.riskSet[0];
    if (owner === undefined) {
      continue;
    }

    const nextOwner = folder.owners[1];
    const fallbackPartner = activeContributors.find((contributorId) => contributorId !== owner.contributorId);
    const priority = actions.length + 1;

    if (nextOwner !== undefined) {
      actions.push({
        priority,
        folder: folder.folder,
        ownerId: owner.contributorId,
        partnerId: nextOwner.contributorId,
        action: "pair_with_next_owner",
      });
    } else if (fallbackPartner !== undefined) {
      actions.push({
        priority,
        folder: folder.folder,
        ownerId: owner.contributorId,
        partnerId: fallbackPartner,
        action: "pair_with_active_contributor",
      });
    } else {
      actions.push({
        priority,
        folder: folder.folder,
        ownerId: owner.contributorId,
        partnerId: null,
        action: "document_ownership",
      });
    }
  }

  return {
    riskLevel: riskLevelForBusFactor(summary.primaryRisk?.busFactor ?? null),
    monopolists,
    exclusiveFolders: collectExclusiveFolders(folders),
    actions,
  };
};
