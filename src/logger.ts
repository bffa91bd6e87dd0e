import chalk from "chalk";

export type LogLevel = "INFO" | "SUCCESS" | "WARN" | "ERROR" | "SKIP" | "NEW" | "FOUND";

const paint: Record<LogLevel, (s: string) => string> = {
  INFO: chalk.blue,
  SUCCESS: chalk.green,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  SKIP: chalk.gray,
  NEW: chalk.cyan,
  FOUND: chalk.magenta,
};

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  const stamp = new Date().toISOString();
  const line = `[${stamp}] ${paint[level](`[${level}]`)} ${msg}`;
  const write = level === "WARN" || level === "ERROR" ? console.error : console.log;
  if (meta !== undefined) {
    write(line, meta);
  } else {
    write(line);
  }
};
