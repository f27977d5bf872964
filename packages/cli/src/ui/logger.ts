import chalk from "chalk";
import type { LogLevel } from "../state/types.js";

let level: LogLevel = "info";

export function setLogLevel(next: LogLevel): void {
  level = next;
}

function enabled(): boolean {
  return level !== "silent";
}

export function info(message: string): void {
  if (enabled()) console.log(`${chalk.blue("ℹ")} ${message}`);
}

export function success(message: string): void {
  if (enabled()) console.log(`${chalk.green("✓")} ${message}`);
}

export function warn(message: string): void {
  if (enabled()) console.log(`${chalk.yellow("⚠")} ${message}`);
}

/** Printed at every level, on stderr. */
export function error(message: string): void {
  console.error(`${chalk.red("✗")} ${message}`);
}

export function debug(message: string): void {
  if (level === "debug" || (enabled() && process.env.DEBUG)) {
    console.log(`${chalk.gray("[debug]")} ${chalk.gray(message)}`);
  }
}

export function step(n: number, total: number, message: string): void {
  if (enabled()) console.log(`${chalk.cyan(`[${n}/${total}]`)} ${message}`);
}

export function header(title: string): void {
  if (enabled()) console.log(`\n${chalk.bold.underline(title)}\n`);
}

export function dim(message: string): void {
  if (enabled()) console.log(chalk.dim(message));
}
