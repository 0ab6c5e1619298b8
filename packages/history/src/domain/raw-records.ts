import { z } from "zod";
import type { FileChange } from "@collabscope/core";

const rawTimestampSchema = z.union([z.string(), z.number()]);

const rawUserSchema = z.object({ login: z.string().min(1) }).nullish();

const lineCountSchema = z.number().int().nonnegative();

export const rawCommitSchema = z.object({
  sha: z.string().min(1),
  commit: z.object({
    message: z.string().default(""),
    author: z.object({
      name: z.string().default(""),
      email: z.string().default(""),
      date: rawTimestampSchema,
    }),
  }),
  author: rawUserSchema,
  stats: z
    .object({
      additions: lineCountSchema,
      deletions: lineCountSchema,
    })
    .optional(),
  files: z
    .array(
      z.object({
        filename: z.string().min(1),
        additions: lineCountSchema.optional(),
        deletions: lineCountSchema.optional(),
      }),
    )
    .optional(),
});

export const rawReviewSchema = z.object({
  user: rawUserSchema,
  state: z.string().min(1),
  submitted_at: rawTimestampSchema.nullish(),
});

export const rawPullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().default(""),
  user: rawUserSchema,
  created_at: rawTimestampSchema,
  merged_at: rawTimestampSchema.nullish(),
  closed_at: rawTimestampSchema.nullish(),
  merge_commit_sha: z.string().min(1).nullish(),
  commits: z.array(z.string().min(1)).optional(),
  reviews: z.array(z.unknown()).optional(),
});

export const rawIssueSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().default(""),
  user: rawUserSchema,
  created_at: rawTimestampSchema,
  closed_at: rawTimestampSchema.nullish(),
  labels: z.array(z.union([z.string(), z.object({ name: z.string() })])).default([]),
  pull_request: z.unknown().optional(),
});

export const rawBranchSchema = z.object({
  name: z.string().min(1),
  commit: z.object({
    sha: z.string().min(1),
    date: rawTimestampSchema,
  }),
  ahead_by: lineCountSchema.default(0),
  behind_by: lineCountSchema.default(0),
  merged: z.boolean().default(false),
});

export const rawDefaultBranchSchema = z.object({
  name: z.string().min(1),
  headSha: z.string().min(1),
});

export type RawCommitRecord = z.input<typeof rawCommitSchema>;
export type RawReviewRecord = z.input<typeof rawReviewSchema>;
export type RawPullRequestRecord = z.input<typeof rawPullRequestSchema>;
export type RawIssueRecord = z.input<typeof rawIssueSchema>;
export type RawBranchRecord = z.input<typeof rawBranchSchema>;

export type ClonedCommit = {
  sha: string;
  authorName: string;
  authorEmail: string;
  committedAtUnix: number;
  subject: string;
  fileChanges: readonly FileChange[];
};

/**
 * Raw material handed over by the fetcher and the cloner. Records are typed as
 * `unknown` because nothing upstream guarantees their shape; each one is
 * validated on its own so a single bad page entry never aborts normalization.
 */
export type RawHistoryInput = {
  commits?: readonly unknown[];
  pullRequests?: readonly unknown[];
  issues?: readonly unknown[];
  branches?: readonly unknown[];
  defaultBranch?: unknown;
  clonedCommits?: readonly ClonedCommit[];
  pagination?: "complete" | "partial";
};
