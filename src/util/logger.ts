import chalk from "chalk";

export type RunLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  /** uncoloured output, e.g. the model's report */
  plain: (msg: string) => void;
};

export function createConsoleLogger(): RunLogger {
  return {
    info: (msg) => console.log(chalk.cyan(msg)),
    warn: (msg) => console.warn(chalk.yellow(msg)),
    error: (msg) => console.error(chalk.red(msg)),
    plain: (msg) => console.log(msg),
  };
}

export function banner(title: string, width = 80): string {
  const rule = "=".repeat(width);
  return `${rule}\n${title}\n${rule}`;
}
