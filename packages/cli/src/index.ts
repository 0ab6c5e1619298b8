import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { ReportFormat } from "@collabscope/reporter";
import { z } from "zod";
import {
  parseIdList,
  resolveWindow,
  toAnalysisOverrides,
  type AnalysisFlags,
  type WindowFlags,
} from "./application/cli-options.js";
import { executeCommand } from "./application/execute-command.js";
import type { AnalyzeOutputMode } from "./application/format-analyze-output.js";
import { loadHistory } from "./application/load-history.js";
import { LOG_LEVELS, createStderrLogger, parseLogLevel, type LogLevel, type Logger } from "./application/logger.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";
import { runChangelogCommand, type ChangelogFormat } from "./application/run-changelog-command.js";
import { runCompareSnapshotsCommand, runCompareWindowsCommand } from "./application/run-compare-command.js";
import { runWhatIfCommand } from "./application/run-what-if-command.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-cli-history-provider.js";

const packageJsonSchema = z.object({ version: z.string() });
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = packageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, "utf8")));

type CommonFlags = AnalysisFlags & {
  logLevel: LogLevel;
  repo?: string;
  name?: string;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const withCommonOptions = (command: Command): Command =>
  command
    .addOption(
      new Option("--log-level <level>", "log verbosity: silent, error, warn, info, debug (logs are written to stderr)")
        .choices(LOG_LEVELS)
        .default(parseLogLevel(process.env["COLLABSCOPE_LOG_LEVEL"])),
    )
    .option("--repo <path>", "local clone whose git log fills in changed files")
    .option("--name <repository>", "repository name shown in reports")
    .option("--folder-depth <depth>", "path segments that identify a folder")
    .option("--coverage-threshold <ratio>", "ownership share a bus-factor set must cover")
    .option("--half-life <days>", "ownership decay half-life in days, or none")
    .option("--bottleneck-percentile <ratio>", "share of slowest reviewers flagged as bottlenecks")
    .option("--inactivity-days <days>", "days without activity before a branch counts as stale")
    .option("--silo-share <ratio>", "top-owner share that marks a knowledge silo")
    .option("--reference-time <date>", "instant ownership decay is measured from")
    .option("--category-prefix <type=category>", "extra changelog prefix mapping (repeatable)", collect, []);

const repositoryName = (inputPath: string, flags: CommonFlags): string => flags.name ?? inputPath;

const historyFor = (inputPath: string, flags: CommonFlags, logger: Logger) =>
  loadHistory(
    {
      inputPath,
      ...(flags.repo === undefined
        ? {}
        : { repositoryPath: flags.repo, gitProvider: new GitCliHistoryProvider(new ExecGitCommandClient()) }),
    },
    logger,
  );

const nowUnix = (): number => Math.floor(Date.now() / 1000);

const program = new Command();

program
  .name("collabscope")
  .description("Collaboration-risk analytics over repository history: bus factor, review culture, stale branches")
  .version(version);

withCommonOptions(
  program
    .command("analyze")
    .argument("<input>", "history dump (JSON) produced by the fetcher")
    .option("--since <date>", "window start (default: 90 days before --until)")
    .option("--until <date>", "window end (default: now)")
    .addOption(
      new Option("--output <mode>", "output mode: summary (default) or json (full metrics)")
        .choices(["summary", "json"])
        .default("summary"),
    )
    .option("--json", "shortcut for --output json")
    .option("--snapshot <path>", "write a snapshot for later comparison"),
).action(
  async (
    input: string,
    options: CommonFlags & WindowFlags & { output: AnalyzeOutputMode; json?: boolean; snapshot?: string },
  ) => {
    const logger = createStderrLogger(options.logLevel, "analyze");
    await executeCommand(async () => {
      const history = await historyFor(input, options, logger);
      return runAnalyzeCommand(
        history,
        {
          window: resolveWindow(options, nowUnix()),
          overrides: toAnalysisOverrides(options),
          repository: repositoryName(input, options),
          output: options.json === true ? "json" : options.output,
          ...(options.snapshot === undefined ? {} : { snapshotPath: options.snapshot }),
        },
        logger,
      );
    }, logger);
  },
);

withCommonOptions(
  program
    .command("compare")
    .argument("[input]", "history dump (JSON); omit when comparing snapshots")
    .option("--baseline-since <date>", "baseline window start")
    .option("--baseline-until <date>", "baseline window end (default: start of the current window)")
    .option("--since <date>", "current window start")
    .option("--until <date>", "current window end (default: now)")
    .option("--baseline <snapshot>", "baseline snapshot file")
    .option("--current <snapshot>", "current snapshot file")
    .addOption(
      new Option("--format <mode>", "output format: text, json, md").choices(["text", "json", "md"]).default("text"),
    ),
).action(
  async (
    input: string | undefined,
    options: CommonFlags &
      WindowFlags & {
        baselineSince?: string;
        baselineUntil?: string;
        baseline?: string;
        current?: string;
        format: ReportFormat;
      },
  ) => {
    const logger = createStderrLogger(options.logLevel, "compare");
    await executeCommand(async () => {
      if (options.baseline !== undefined && options.current !== undefined) {
        return runCompareSnapshotsCommand(
          { baselinePath: options.baseline, currentPath: options.current, format: options.format },
          logger,
        );
      }
      if (input === undefined) {
        return { ok: false, message: "compare needs a history dump or --baseline and --current snapshots" };
      }

      const current = resolveWindow(options, nowUnix());
      const baseline = resolveWindow(
        {
          ...(options.baselineSince === undefined ? {} : { since: options.baselineSince }),
          until: options.baselineUntil ?? new Date(current.startUnix * 1000).toISOString(),
        },
        current.startUnix,
        "baseline-",
      );
      const history = await historyFor(input, options, logger);
      return runCompareWindowsCommand(
        history,
        {
          baseline,
          current,
          overrides: toAnalysisOverrides(options),
          repository: repositoryName(input, options),
          format: options.format,
        },
        logger,
      );
    }, logger);
  },
);

withCommonOptions(
  program
    .command("what-if")
    .argument("<input>", "history dump (JSON) produced by the fetcher")
    .option("--remove <ids>", "comma-separated contributors to remove (default: each top owner in turn)", "")
    .option("--deprecate <folder>", "folder to deprecate (default: each top folder in turn)")
    .option("--since <date>", "window start (default: 90 days before --until)")
    .option("--until <date>", "window end (default: now)")
    .addOption(
      new Option("--output <mode>", "output mode: summary (default) or json (full scenario)")
        .choices(["summary", "json"])
        .default("summary"),
    ),
).action(
  async (
    input: string,
    options: CommonFlags & WindowFlags & { remove: string; deprecate?: string; output: AnalyzeOutputMode },
  ) => {
    const logger = createStderrLogger(options.logLevel, "what-if");
    await executeCommand(async () => {
      const history = await historyFor(input, options, logger);
      return runWhatIfCommand(
        history,
        {
          window: resolveWindow(options, nowUnix()),
          overrides: toAnalysisOverrides(options),
          remove: parseIdList(options.remove),
          ...(options.deprecate === undefined ? {} : { deprecateFolder: options.deprecate }),
          output: options.output,
        },
        logger,
      );
    }, logger);
  },
);

withCommonOptions(
  program
    .command("changelog")
    .argument("<input>", "history dump (JSON) produced by the fetcher")
    .option("--since <date>", "window start (default: 90 days before --until)")
    .option("--until <date>", "window end (default: now)")
    .option("--title <title>", "heading of the markdown changelog")
    .addOption(new Option("--format <mode>", "output format: md, json").choices(["md", "json"]).default("md")),
).action(
  async (input: string, options: CommonFlags & WindowFlags & { format: ChangelogFormat; title?: string }) => {
    const logger = createStderrLogger(options.logLevel, "changelog");
    await executeCommand(async () => {
      const history = await historyFor(input, options, logger);
      return runChangelogCommand(
        history,
        {
          window: resolveWindow(options, nowUnix()),
          overrides: toAnalysisOverrides(options),
          format: options.format,
          ...(options.title === undefined ? {} : { title: options.title }),
        },
        logger,
      );
    }, logger);
  },
);

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--" ? [executablePath, scriptPath, ...process.argv.slice(3)] : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
