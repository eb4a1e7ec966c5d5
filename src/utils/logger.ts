import chalk from "chalk";

const prefix = chalk.bold("[petcare]");

function statusColor(status: number): string {
  if (status >= 500) return chalk.red(String(status));
  if (status >= 400) return chalk.yellow(String(status));
  return chalk.green(String(status));
}

export const log = {
  info: (msg: string) => console.log(`${prefix} ${msg}`),
  success: (msg: string) => console.log(`${prefix} ${chalk.green("✓")} ${msg}`),
  warn: (msg: string) => console.log(`${prefix} ${chalk.yellow("⚠")} ${msg}`),
  error: (msg: string) => console.error(`${prefix} ${chalk.red("✗")} ${msg}`),
  dim: (msg: string) => console.log(`${prefix} ${chalk.dim(msg)}`),
  panel: (panel: string, msg: string) =>
    console.log(`${prefix} ${chalk.cyan(`[${panel}]`)} ${msg}`),
  request: (method: string, url: string, status: number, duration: string) =>
    console.log(
      `${prefix} ${chalk.dim(method)} ${url} ${statusColor(status)} ${chalk.dim(duration)}`,
    ),
};
