export {
  buildOwnershipMatrix,
  contributorTotals,
  decayFactor,
  findKnowledgeSilos,
  folderTotals,
  groupCellsByFolder,
} from "./domain/knowledge-map.js";
export { computeBusFactor } from "./domain/bus-factor.js";
export { buildMitigationPlan, riskLevelForBusFactor } from "./domain/mitigation.js";
export {
  KEY_SCENARIO_COUNT,
  collectFileAuthors,
  simulateContributorRemoval,
  simulateFolderDeprecation,
  simulateKeyScenarios,
  type FileAuthors,
  type RemovalConfig,
} from "./domain/what-if.js";
export {
  DEFAULT_OWNERSHIP_CONFIG,
  type BuildOwnershipMatrixOptions,
  type BusFactorConfig,
  type KnowledgeMapConfig,
  type KnowledgeMapProgressEvent,
  type OwnershipConfig,
} from "./domain/ownership-types.js";
