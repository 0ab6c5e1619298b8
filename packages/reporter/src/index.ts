import type { CollabscopeReport, ReportFormat } from "./domain.js";
import { compareSnapshots } from "./diff.js";
import { createReport } from "./report.js";
import { renderChangelogMarkdown, renderMarkdownReport, renderTextReport } from "./renderers.js";
import { createSnapshot, parseSnapshot, serializeSnapshot, SnapshotParseError } from "./snapshot.js";

export {
  SNAPSHOT_SCHEMA_VERSION,
  REPORT_SCHEMA_VERSION,
  METRICS_MODEL_VERSION,
  formatDelta,
  formatWindow,
  type CollabscopeSnapshot,
  type CollabscopeReport,
  type SnapshotDiff,
  type ReportFormat,
} from "./domain.js";
export { annotateResult, type AnnotatedResult, type ResultAnnotator } from "./annotator.js";
export { categoryTitle } from "./renderers.js";
export type { CreateSnapshotInput, SnapshotParseErrorReason } from "./snapshot.js";

export {
  createSnapshot,
  serializeSnapshot,
  parseSnapshot,
  SnapshotParseError,
  compareSnapshots,
  createReport,
  renderChangelogMarkdown,
};

export const formatReport = (report: CollabscopeReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  return renderTextReport(report);
};
