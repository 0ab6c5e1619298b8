import { diffWindowMetrics } from "@collabscope/engine";
import type { CollabscopeSnapshot, SnapshotDiff } from "./domain.js";

/** Diff of two snapshots, baseline → current. */
export const compareSnapshots = (current: CollabscopeSnapshot, baseline: CollabscopeSnapshot): SnapshotDiff => ({
  baselineWindow: baseline.metrics.window,
  currentWindow: current.metrics.window,
  metrics: diffWindowMetrics(baseline.metrics, current.metrics),
});
