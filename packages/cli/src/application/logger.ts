export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Lines read `[collabscope <command>] LEVEL message`. Levels below `level`
 * are dropped; `silent` drops everything.
 */
export const createStderrLogger = (level: LogLevel, command: string, sink: LogSink = stderrSink): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);
  const at =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(messageLevel) <= threshold) {
        sink(`[collabscope ${command}] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return { error: at("error"), warn: at("warn"), info: at("info"), debug: at("debug") };
};

/** Unknown or missing values fall back to `info`. */
export const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((candidate) => candidate === value?.trim().toLowerCase()) ?? "info";
