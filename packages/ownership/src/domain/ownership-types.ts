export type KnowledgeMapConfig = {
  folderDepth: number;
  /** `null` disables recency decay. */
  decayHalfLifeDays: number | null;
  /** Defaults to the window end when `null`. */
  referenceTimeUnix: number | null;
};

export type BusFactorConfig = {
  coverageThreshold: number;
};

export type OwnershipConfig = KnowledgeMapConfig &
  BusFactorConfig & {
    siloShareThreshold: number;
  };

export const DEFAULT_OWNERSHIP_CONFIG: OwnershipConfig = {
  folderDepth: 2,
  decayHalfLifeDays: 90,
  referenceTimeUnix: null,
  coverageThreshold: 0.5,
  siloShareThreshold: 0.8,
};

export type KnowledgeMapProgressEvent = {
  processedCommits: number;
  totalCommits: number;
};

export type BuildOwnershipMatrixOptions = {
  signal?: AbortSignal;
  onProgress?: (event: KnowledgeMapProgressEvent) => void;
};
