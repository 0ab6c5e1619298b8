import { CliInputError } from "./cli-options.js";
import type { CommandResult } from "./command-result.js";
import type { Logger } from "./logger.js";

export type CommandIo = {
  write: (text: string) => void;
  setExitCode: (code: number) => void;
};

export const processIo: CommandIo = {
  write: (text) => {
    process.stdout.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/** Prints a command's result; input and configuration errors go to the logger with exit code 1. */
export const executeCommand = async (
  command: () => CommandResult | Promise<CommandResult>,
  logger: Logger,
  io: CommandIo = processIo,
): Promise<void> => {
  let result: CommandResult;
  try {
    result = await command();
  } catch (error) {
    if (error instanceof CliInputError) {
      logger.error(error.message);
      io.setExitCode(1);
      return;
    }
    throw error;
  }

  if (!result.ok) {
    logger.error(result.message);
    io.setExitCode(1);
    return;
  }

  if (result.empty) {
    logger.warn("no activity in the selected window");
  }
  io.write(`${result.rendered}\n`);
};
