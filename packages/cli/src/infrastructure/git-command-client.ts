import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];

  constructor(message: string, args: readonly string[]) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

export type ExecGitOptions = {
  maxBufferBytes?: number;
  timeoutMs?: number;
};

const DEFAULT_EXEC_GIT_OPTIONS: Required<ExecGitOptions> = {
  maxBufferBytes: 256 * 1024 * 1024,
  timeoutMs: 5 * 60 * 1000,
};

/** git's own `fatal:`/`error:` line when it wrote one, the spawn error otherwise. */
export const describeGitFailure = (error: unknown): string => {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const stderr = String(error.stderr).trim();
    const firstLine = stderr.split("\n").find((line) => line.trim().length > 0);
    if (firstLine !== undefined) {
      return firstLine.trim();
    }
  }

  return error instanceof Error ? error.message : "unknown git execution error";
};

export class ExecGitCommandClient implements GitCommandClient {
  private readonly options: Required<ExecGitOptions>;

  constructor(options: ExecGitOptions = {}) {
    this.options = { ...DEFAULT_EXEC_GIT_OPTIONS, ...options };
  }

  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: this.options.maxBufferBytes,
        timeout: this.options.timeoutMs,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      throw new GitCommandError(`git ${args[0] ?? ""} failed in ${repositoryPath}: ${describeGitFailure(error)}`, args);
    }
  }
}
