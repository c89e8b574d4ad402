import chalk from "chalk";
import type { ResourceGraphLogger } from "./ResourceGraphLogger.js";

const PREFIX = chalk.dim("[resource-graph]");

/**
 * Terminal logger with colored markers. All output goes to stderr.
 *
 * @param write - Line writer (default: console.error)
 */
export const createConsoleLogger = (
  write: (line: string) => void = (line) => console.error(line),
): ResourceGraphLogger => ({
  success(message: string): void {
    write(`${PREFIX} ${chalk.green("✓")} ${message}`);
  },

  info(message: string): void {
    write(`${PREFIX} ${message}`);
  },

  warn(message: string): void {
    write(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
  },

  error(message: string): void {
    write(`${PREFIX} ${chalk.red("✗")} ${message}`);
  },
});

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleLogger();
