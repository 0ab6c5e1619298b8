import type { WindowMetrics } from "@collabscope/core";
import type { AnalysisOptions } from "@collabscope/engine";
import { METRICS_MODEL_VERSION, SNAPSHOT_SCHEMA_VERSION, type CollabscopeSnapshot } from "./domain.js";
import { snapshotEnvelopeSchema, snapshotVersionSchema } from "./snapshot-schema.js";

export type SnapshotParseErrorReason = "invalid_json" | "unsupported_snapshot_schema" | "invalid_snapshot";

export class SnapshotParseError extends Error {
  readonly reason: SnapshotParseErrorReason;

  constructor(reason: SnapshotParseErrorReason, detail?: string) {
    super(detail === undefined ? reason : `${reason}: ${detail}`);
    this.name = "SnapshotParseError";
    this.reason = reason;
  }
}

export type CreateSnapshotInput = {
  metrics: WindowMetrics;
  repository: string;
  generatedAt?: string;
  analysisOptions?: AnalysisOptions;
};

export const createSnapshot = (input: CreateSnapshotInput): CollabscopeSnapshot => ({
  schemaVersion: SNAPSHOT_SCHEMA_VERSION,
  generatedAt: input.generatedAt ?? new Date().toISOString(),
  metricsModelVersion: METRICS_MODEL_VERSION,
  source: {
    repository: input.repository,
  },
  metrics: input.metrics,
  ...(input.analysisOptions === undefined ? {} : { analysisOptions: input.analysisOptions }),
});

export const serializeSnapshot = (snapshot: CollabscopeSnapshot): string => JSON.stringify(snapshot, null, 2);

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SnapshotParseError("invalid_json", error instanceof Error ? error.message : undefined);
  }
};

export const parseSnapshot = (raw: string): CollabscopeSnapshot => {
  const json = parseJson(raw);
  if (!snapshotVersionSchema.safeParse(json).success) {
    throw new SnapshotParseError("unsupported_snapshot_schema");
  }

  const parsed = snapshotEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new SnapshotParseError(
      "invalid_snapshot",
      first === undefined ? undefined : `${first.path.join(".")}: ${first.message}`,
    );
  }

  const { analysisOptions, ...snapshot } = parsed.data;
  return {
    ...snapshot,
    ...(analysisOptions === undefined ? {} : { analysisOptions }),
  };
};
