import { z } from "zod";
import { SNAPSHOT_SCHEMA_VERSION } from "./domain.js";

const windowSchema = z.object({ startUnix: z.number(), endUnix: z.number() });

const contributorActivitySchema = z.object({
  contributorId: z.string(),
  commitCount: z.number(),
  linesAdded: z.number(),
  linesRemoved: z.number(),
  pullRequestsOpened: z.number(),
  pullRequestsMerged: z.number(),
  issuesOpened: z.number(),
  issuesClosed: z.number(),
  foldersTouched: z.array(z.string()),
  firstCommitAtUnix: z.number().nullable(),
  lastCommitAtUnix: z.number().nullable(),
});

const contributorStatsSchema = z.object({
  contributors: z.array(contributorActivitySchema),
  totals: z.object({
    contributors: z.number(),
    commits: z.number(),
    linesAdded: z.number(),
    linesRemoved: z.number(),
    pullRequestsOpened: z.number(),
    pullRequestsMerged: z.number(),
    issuesOpened: z.number(),
    issuesClosed: z.number(),
  }),
});

const ownershipMatrixSchema = z.object({
  folderDepth: z.number(),
  decayHalfLifeDays: z.number().nullable(),
  referenceTimeUnix: z.number(),
  cells: z.array(
    z.object({
      contributorId: z.string(),
      folder: z.string(),
      weight: z.number(),
      commits: z.number(),
      linesChanged: z.number(),
    }),
  ),
});

const folderOwnerSchema = z.object({ contributorId: z.string(), weight: z.number(), share: z.number() });

const folderBusFactorSchema = z.discriminatedUnion("status", [
  z.object({
    folder: z.string(),
    status: z.literal("defined"),
    busFactor: z.number(),
    totalWeight: z.number(),
    riskSet: z.array(folderOwnerSchema),
    owners: z.array(folderOwnerSchema),
  }),
  z.object({
    folder: z.string(),
    status: z.literal("undefined"),
    reason: z.literal("zero_total_weight"),
  }),
]);

const busFactorSchema = z.object({
  coverageThreshold: z.number(),
  folders: z.array(folderBusFactorSchema),
  ranking: z.array(z.string()),
  primaryRisk: z.object({ folder: z.string(), busFactor: z.number(), totalWeight: z.number() }).nullable(),
  repositoryBusFactor: z.number().nullable(),
});

const mitigationSchema = z.object({
  riskLevel: z.enum(["critical", "high", "medium", "low", "none"]),
  monopolists: z.array(z.string()),
  exclusiveFolders: z.array(z.object({ contributorId: z.string(), folders: z.array(z.string()) })),
  actions: z.array(
    z.object({
      priority: z.number(),
      folder: z.string(),
      ownerId: z.string(),
      partnerId: z.string().nullable(),
      action: z.enum(["pair_with_next_owner", "pair_with_active_contributor", "document_ownership"]),
    }),
  ),
});

const reviewCultureSchema = z.object({
  pullRequestsInScope: z.number(),
  reviewedPullRequests: z.number(),
  pendingReviewCount: z.number(),
  meanHoursToFirstReview: z.number().nullable(),
  medianHoursToFirstReview: z.number().nullable(),
  reviewers: z.array(
    z.object({
      reviewerId: z.string(),
      reviewCount: z.number(),
      reviewedPullRequests: z.number(),
      approvals: z.number(),
      changesRequested: z.number(),
      approvalRate: z.number(),
      meanHoursToFirstReview: z.number().nullable(),
      medianHoursToFirstReview: z.number().nullable(),
    }),
  ),
  pairs: z.array(z.object({ authorId: z.string(), reviewerId: z.string(), pullRequests: z.number() })),
  bottleneckReviewers: z.array(z.string()),
});

const branchCategorySchema = z.enum(["merged", "orphan", "abandoned", "wip"]);

const staleBranchSchema = z.object({
  defaultBranch: z.string().nullable(),
  inactivityThresholdDays: z.number(),
  branches: z.array(
    z.object({
      name: z.string(),
      category: branchCategorySchema,
      daysInactive: z.number(),
      aheadBy: z.number(),
      behindBy: z.number(),
      lastActivityAtUnix: z.number(),
    }),
  ),
  counts: z.object({ merged: z.number(), orphan: z.number(), abandoned: z.number(), wip: z.number() }),
  staleBranches: z.array(z.string()),
  deletableBranches: z.array(z.string()),
});

const changelogSchema = z.object({
  groups: z.array(
    z.object({
      category: z.string(),
      entries: z.array(
        z.object({
          category: z.string(),
          scope: z.string().nullable(),
          breaking: z.boolean(),
          description: z.string(),
          authorId: z.string(),
          reference: z.string(),
          source: z.enum(["pull_request", "commit"]),
          timestampUnix: z.number(),
        }),
      ),
    }),
  ),
  entryCount: z.number(),
});

export const windowMetricsSchema = z.object({
  window: windowSchema,
  contributors: contributorStatsSchema,
  ownership: ownershipMatrixSchema,
  busFactor: busFactorSchema,
  silos: z.array(z.object({ folder: z.string(), ownerId: z.string(), share: z.number(), totalWeight: z.number() })),
  mitigation: mitigationSchema,
  reviewCulture: reviewCultureSchema,
  branches: staleBranchSchema,
  changelog: changelogSchema,
});

const analysisOptionsSnapshotSchema = z.object({
  decayHalfLifeDays: z.number().nullable(),
  folderDepth: z.number(),
  coverageThreshold: z.number(),
  bottleneckPercentile: z.number(),
  inactivityThresholdDays: z.number(),
  categoryPrefixes: z.record(z.string(), z.string()),
  siloShareThreshold: z.number(),
  referenceTimeUnix: z.number().nullable(),
});

export const snapshotVersionSchema = z.object({ schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION) });

export const snapshotEnvelopeSchema = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  generatedAt: z.string(),
  metricsModelVersion: z.string(),
  source: z.object({ repository: z.string() }),
  metrics: windowMetricsSchema,
  analysisOptions: analysisOptionsSnapshotSchema.optional(),
});
