import chalk from "chalk";

type Level = "debug" | "info" | "warn" | "error";

const ORDER: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLevel(value: string): value is Level {
  return value in ORDER;
}

function minLevel(): Level {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(raw) ? raw : "info";
}

function stamp(): string {
  return chalk.gray(new Date().toISOString());
}

function enabled(level: Level): boolean {
  return ORDER[level] >= ORDER[minLevel()];
}

export const logger = {
  debug(msg: string) {
    if (enabled("debug")) console.log(`${stamp()} ${chalk.magenta("DEBUG")} ${msg}`);
  },
  info(msg: string) {
    if (enabled("info")) console.log(`${stamp()} ${chalk.cyan("INFO ")} ${msg}`);
  },
  warn(msg: string) {
    if (enabled("warn")) console.warn(`${stamp()} ${chalk.yellow("WARN ")} ${msg}`);
  },
  error(msg: string) {
    if (enabled("error")) console.error(`${stamp()} ${chalk.red("ERROR")} ${msg}`);
  },
};
