import chalk from "chalk";
import type { JanitorLogger } from "./JanitorLogger.js";

const PREFIX = chalk.dim("[graph-janitor]");
const MOVE_UP = "\x1b[1A"; // Move cursor up one line
const CLEAR_LINE = "\x1b[2K\r"; // Clear entire line and return to column 0

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean;
  /** Destination stream (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Terminal-based logger with colors and in-place progress updates.
 *
 * - Progress updates overwrite the current line (in-place)
 * - Uses cursor-up movement to handle interleaved output
 * - All output goes to stderr
 */
export const createConsoleJanitorLogger = (
  options: ConsoleLoggerOptions = {},
): JanitorLogger => {
  const verbose = options.verbose ?? false;
  const stream = options.stream ?? process.stderr;
  let currentLabel = "";
  let currentTotal = 0;
  let isProgressActive = false;

  const clearProgress = (): void => {
    if (isProgressActive) {
      stream.write(`${MOVE_UP}${CLEAR_LINE}`);
      isProgressActive = false;
    }
  };

  const writeProgress = (current: number): void => {
    const progressText = `${PREFIX} ${chalk.cyan("→")} ${currentLabel}... ${current}/${currentTotal}`;
    if (isProgressActive) {
      stream.write(`${MOVE_UP}${CLEAR_LINE}${progressText}\n`);
    } else {
      stream.write(`${progressText}\n`);
    }
    isProgressActive = true;
  };

  const writeLine = (text: string): void => {
    clearProgress();
    stream.write(`${text}\n`);
  };

  return {
    startProgress(total: number, label: string): void {
      currentLabel = label;
      currentTotal = total;
      writeProgress(0);
    },

    updateProgress(current: number): void {
      writeProgress(current);
    },

    completeProgress(message: string): void {
      clearProgress();
      stream.write(`${PREFIX} ${chalk.green("✓")} ${message}\n`);
      currentLabel = "";
      currentTotal = 0;
    },

    debug(message: string): void {
      if (verbose) {
        writeLine(`${PREFIX} ${chalk.gray(message)}`);
      }
    },

    success(message: string): void {
      writeLine(`${PREFIX} ${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      writeLine(`${PREFIX} ${message}`);
    },

    warn(message: string): void {
      writeLine(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      writeLine(`${PREFIX} ${chalk.red("✗")} ${message}`);
    },
  };
};
