import { SECONDS_PER_DAY, type AnalysisWindow } from "@collabscope/core";
import { DEFAULT_ANALYSIS_OPTIONS, type AnalysisOptionsOverrides } from "@collabscope/engine";
import { parseTimestamp } from "@collabscope/history";
import { z } from "zod";

export const DEFAULT_WINDOW_DAYS = 90;

/** Bad command-line input: unparseable dates, numbers, or dump files. */
export class CliInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliInputError";
  }
}

export type WindowFlags = {
  since?: string;
  until?: string;
};

export type AnalysisFlags = {
  folderDepth?: string;
  coverageThreshold?: string;
  halfLife?: string;
  bottleneckPercentile?: string;
  inactivityDays?: string;
  siloShare?: string;
  referenceTime?: string;
  categoryPrefix?: readonly string[];
};

const numericFlagSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/)
  .transform(Number);

const categoryPrefixSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]+=[A-Za-z]+$/)
  .transform((value) => {
    const [type = "", category = ""] = value.split("=");
    return [type.toLowerCase(), category.toLowerCase()] as const;
  });

/** ISO dates or unix seconds; a date-time without a zone is UTC. */
export const parseDateFlag = (value: string, flag: string): number => {
  const parsed = parseTimestamp(value);
  if (parsed === null) {
    throw new CliInputError(`${flag}: invalid date "${value}"`);
  }

  return Math.floor(parsed);
};

const parseNumberFlag = (value: string | undefined, flag: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const parsed = numericFlagSchema.safeParse(value);
  if (!parsed.success) {
    throw new CliInputError(`${flag}: expected a number, got "${value}"`);
  }
  return parsed.data;
};

/** `--until` defaults to now; `--since` to {@link DEFAULT_WINDOW_DAYS} days before the end. */
export const resolveWindow = (flags: WindowFlags, nowUnix: number, prefix = ""): AnalysisWindow => {
  const endUnix = flags.until === undefined ? nowUnix : parseDateFlag(flags.until, `--${prefix}until`);
  const startUnix =
    flags.since === undefined
      ? endUnix - DEFAULT_WINDOW_DAYS * SECONDS_PER_DAY
      : parseDateFlag(flags.since, `--${prefix}since`);

  return { startUnix, endUnix };
};

const parseCategoryPrefixes = (values: readonly string[]): Record<string, string> => {
  const prefixes: Record<string, string> = { ...DEFAULT_ANALYSIS_OPTIONS.categoryPrefixes };
  for (const value of values) {
    const parsed = categoryPrefixSchema.safeParse(value);
    if (!parsed.success) {
      throw new CliInputError(`--category-prefix: expected type=category, got "${value}"`);
    }

    const [type, category] = parsed.data;
    prefixes[type] = category;
  }

  return prefixes;
};

/** Range checks are left to the engine, which reports every violation at once. */
export const toAnalysisOverrides = (flags: AnalysisFlags): AnalysisOptionsOverrides => {
  const folderDepth = parseNumberFlag(flags.folderDepth, "--folder-depth");
  const coverageThreshold = parseNumberFlag(flags.coverageThreshold, "--coverage-threshold");
  const bottleneckPercentile = parseNumberFlag(flags.bottleneckPercentile, "--bottleneck-percentile");
  const inactivityThresholdDays = parseNumberFlag(flags.inactivityDays, "--inactivity-days");
  const siloShareThreshold = parseNumberFlag(flags.siloShare, "--silo-share");
  const decayHalfLifeDays =
    flags.halfLife === "none" ? null : parseNumberFlag(flags.halfLife, "--half-life");
  const referenceTimeUnix =
    flags.referenceTime === undefined ? undefined : parseDateFlag(flags.referenceTime, "--reference-time");

  return {
    ...(folderDepth === undefined ? {} : { folderDepth }),
    ...(coverageThreshold === undefined ? {} : { coverageThreshold }),
    ...(bottleneckPercentile === undefined ? {} : { bottleneckPercentile }),
    ...(inactivityThresholdDays === undefined ? {} : { inactivityThresholdDays }),
    ...(siloShareThreshold === undefined ? {} : { siloShareThreshold }),
    ...(decayHalfLifeDays === undefined ? {} : { decayHalfLifeDays }),
    ...(referenceTimeUnix === undefined ? {} : { referenceTimeUnix }),
    ...(flags.categoryPrefix === undefined || flags.categoryPrefix.length === 0
      ? {}
      : { categoryPrefixes: parseCategoryPrefixes(flags.categoryPrefix) }),
  };
};

export const parseIdList = (value: string): readonly string[] =>
  [...new Set(value.split(",").map((id) => id.trim().toLowerCase()))].filter((id) => id.length > 0);
