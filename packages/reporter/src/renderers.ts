import type { Changelog, ChangelogEntry, MembershipDelta, NumericDelta } from "@collabscope/core";
import { formatDelta, formatWindow, type CollabscopeReport, type SnapshotDiff } from "./domain.js";

const CATEGORY_TITLES: Readonly<Record<string, string>> = {
  feat: "Features",
  fix: "Bug Fixes",
  docs: "Documentation",
  perf: "Performance",
  refactor: "Refactoring",
  test: "Tests",
  build: "Build",
  ci: "Continuous Integration",
  chore: "Chores",
  style: "Style",
  revert: "Reverts",
  other: "Other Changes",
};

export const categoryTitle = (category: string): string => CATEGORY_TITLES[category] ?? category;

const listOrNone = (items: readonly string[], wrap: (item: string) => string = (item) => item): string =>
  items.map(wrap).join(", ") || "none";

const code = (value: string | number): string => `\`${value}\``;

/** Numeric deltas worth showing: anything that moved, including a value appearing or disappearing. */
const changedDeltas = (deltas: readonly NumericDelta[]): readonly NumericDelta[] =>
  deltas.filter((delta) => (delta.delta === null ? delta.before !== delta.after : delta.delta !== 0));

const membershipLines = (diff: SnapshotDiff): ReadonlyArray<readonly [string, MembershipDelta]> => [
  ["contributors", diff.metrics.contributors],
  ["folders", diff.metrics.folders],
  ["bottleneck reviewers", diff.metrics.bottleneckReviewers],
  ["stale branches", diff.metrics.staleBranches],
];

const renderTextDiff = (report: CollabscopeReport): string[] => {
  if (report.diff === undefined) {
    return [];
  }

  const { diff } = report;
  const lines = ["", "Diff", `  baseline: ${formatWindow(diff.baselineWindow)}`];
  for (const delta of changedDeltas(diff.metrics.numeric)) {
    lines.push(`  ${delta.metric}: ${formatDelta(delta)}`);
  }
  for (const delta of changedDeltas(diff.metrics.folderBusFactors)) {
    lines.push(`  busFactor ${delta.metric}: ${formatDelta(delta)}`);
  }
  for (const [label, membership] of membershipLines(diff)) {
    lines.push(`  ${label}: +[${listOrNone(membership.added)}] -[${listOrNone(membership.removed)}]`);
  }

  return lines;
};

export const renderTextReport = (report: CollabscopeReport): string => {
  const lines: string[] = [];
  const primary = report.repository.primaryRisk;
  lines.push("Repository Summary");
  lines.push(`  repository: ${report.repository.name}`);
  lines.push(`  window: ${formatWindow(report.repository.window)}`);
  lines.push(`  riskLevel: ${report.repository.riskLevel}`);
  lines.push(
    `  primaryRisk: ${primary === null ? "none" : `${primary.folder} (busFactor=${primary.busFactor}, owners=${primary.riskSet.join(", ")})`}`,
  );
  lines.push(`  repositoryBusFactor: ${report.repository.repositoryBusFactor ?? "n/a"}`);

  lines.push("");
  lines.push("Contributors");
  lines.push(`  total: ${report.contributors.total}`);
  lines.push(`  commits: ${report.contributors.commits}`);
  for (const contributor of report.contributors.top) {
    lines.push(`  - ${contributor.contributorId} | commits=${contributor.commitCount} lines=${contributor.linesChanged}`);
  }

  lines.push("");
  lines.push("Bus Factor");
  for (const folder of report.riskiestFolders) {
    lines.push(
      `  - ${folder.folder} | busFactor=${folder.busFactor} | weight=${folder.totalWeight} | riskSet=${folder.riskSet.join(", ")}`,
    );
  }
  lines.push(`  silos: ${listOrNone(report.silos.map((silo) => `${silo.folder} (${silo.ownerId} ${silo.share})`))}`);

  lines.push("");
  lines.push("Mitigation");
  for (const action of report.actions) {
    lines.push(
      `  ${action.priority}. ${action.folder}: ${action.action} owner=${action.ownerId} partner=${action.partnerId ?? "none"}`,
    );
  }
  if (report.actions.length === 0) {
    lines.push("  none");
  }

  lines.push("");
  lines.push("Review Culture");
  lines.push(`  pullRequestsInScope: ${report.reviewCulture.pullRequestsInScope}`);
  lines.push(`  pendingReviewCount: ${report.reviewCulture.pendingReviewCount}`);
  lines.push(`  medianHoursToFirstReview: ${report.reviewCulture.medianHoursToFirstReview ?? "n/a"}`);
  lines.push(`  bottleneckReviewers: ${listOrNone(report.reviewCulture.bottleneckReviewers)}`);

  lines.push("");
  lines.push("Branches");
  const counts = report.branches.counts;
  lines.push(`  merged=${counts.merged} orphan=${counts.orphan} abandoned=${counts.abandoned} wip=${counts.wip}`);
  lines.push(`  stale: ${listOrNone(report.branches.staleBranches)}`);
  lines.push(`  deletable: ${listOrNone(report.branches.deletableBranches)}`);

  lines.push("");
  lines.push("Changelog");
  lines.push(`  entries: ${report.changelog.entryCount}`);
  for (const category of report.changelog.categories) {
    lines.push(`  ${category.category}: ${category.entries}`);
  }

  lines.push("");
  lines.push("Appendix");
  lines.push(`  snapshotSchemaVersion: ${report.appendix.snapshotSchemaVersion}`);
  lines.push(`  metricsModelVersion: ${report.appendix.metricsModelVersion}`);
  lines.push(`  timestamp: ${report.appendix.timestamp}`);

  lines.push(...renderTextDiff(report));

  return lines.join("\n");
};

const renderMarkdownDiff = (report: CollabscopeReport): string[] => {
  if (report.diff === undefined) {
    return [];
  }

  const { diff } = report;
  const lines = ["", "## Diff", `- baseline: ${code(formatWindow(diff.baselineWindow))}`];
  for (const delta of changedDeltas(diff.metrics.numeric)) {
    lines.push(`- ${delta.metric}: ${code(formatDelta(delta))}`);
  }
  for (const delta of changedDeltas(diff.metrics.folderBusFactors)) {
    lines.push(`- bus factor of ${code(delta.metric)}: ${code(formatDelta(delta))}`);
  }
  for (const [label, membership] of membershipLines(diff)) {
    lines.push(`- new ${label}: ${listOrNone(membership.added, code)}`);
    lines.push(`- gone ${label}: ${listOrNone(membership.removed, code)}`);
  }

  return lines;
};

export const renderMarkdownReport = (report: CollabscopeReport): string => {
  const lines: string[] = [];
  const primary = report.repository.primaryRisk;
  lines.push("# Collaboration Risk Report");
  lines.push("");
  lines.push("## Repository Summary");
  lines.push(`- repository: ${code(report.repository.name)}`);
  lines.push(`- window: ${code(formatWindow(report.repository.window))}`);
  lines.push(`- risk level: ${code(report.repository.riskLevel)}`);
  lines.push(
    `- primary risk: ${primary === null ? "none" : `${code(primary.folder)} (bus factor ${code(primary.busFactor)})`}`,
  );
  lines.push(`- repository bus factor: ${code(report.repository.repositoryBusFactor ?? "n/a")}`);

  lines.push("");
  lines.push("## Riskiest Folders");
  lines.push("| folder | bus factor | weight | risk set |");
  lines.push("| --- | --- | --- | --- |");
  for (const folder of report.riskiestFolders) {
    lines.push(`| ${code(folder.folder)} | ${folder.busFactor} | ${folder.totalWeight} | ${folder.riskSet.join(", ")} |`);
  }

  lines.push("");
  lines.push("## Mitigation");
  for (const action of report.actions) {
    const partner = action.partnerId === null ? "" : ` with ${code(action.partnerId)}`;
    lines.push(`${action.priority}. ${code(action.folder)}: ${action.action} for ${code(action.ownerId)}${partner}`);
  }
  if (report.actions.length === 0) {
    lines.push("- none");
  }

  lines.push("");
  lines.push("## Review Culture");
  lines.push(`- pull requests in scope: ${code(report.reviewCulture.pullRequestsInScope)}`);
  lines.push(`- pending reviews: ${code(report.reviewCulture.pendingReviewCount)}`);
  lines.push(`- median hours to first review: ${code(report.reviewCulture.medianHoursToFirstReview ?? "n/a")}`);
  lines.push(`- bottleneck reviewers: ${listOrNone(report.reviewCulture.bottleneckReviewers, code)}`);

  lines.push("");
  lines.push("## Branches");
  const counts = report.branches.counts;
  lines.push(`- merged: ${code(counts.merged)}, orphan: ${code(counts.orphan)}, abandoned: ${code(counts.abandoned)}, wip: ${code(counts.wip)}`);
  lines.push(`- stale: ${listOrNone(report.branches.staleBranches, code)}`);
  lines.push(`- deletable: ${listOrNone(report.branches.deletableBranches, code)}`);

  lines.push("");
  lines.push("## Appendix");
  lines.push(`- snapshot schema: ${code(report.appendix.snapshotSchemaVersion)}`);
  lines.push(`- metrics model version: ${code(report.appendix.metricsModelVersion)}`);
  lines.push(`- timestamp: ${code(report.appendix.timestamp)}`);

  lines.push(...renderMarkdownDiff(report));

  return lines.join("\n");
};

const renderChangelogEntry = (entry: ChangelogEntry): string => {
  const breaking = entry.breaking ? "**BREAKING** " : "";
  const scope = entry.scope === null ? "" : `**${entry.scope}:** `;
  return `- ${breaking}${scope}${entry.description} (${entry.reference}, @${entry.authorId})`;
};

export const renderChangelogMarkdown = (changelog: Changelog, title = "Changelog"): string => {
  const lines = [`# ${title}`];
  if (changelog.entryCount === 0) {
    lines.push("", "_No changes in this window._");
    return lines.join("\n");
  }

  for (const group of changelog.groups) {
    lines.push("", `## ${categoryTitle(group.category)}`, "");
    lines.push(...group.entries.map(renderChangelogEntry));
  }

  return lines.join("\n");
};
