import chalk from "chalk";
import { getLogDedupe, type LogLevel } from "./log-dedupe.util";
import { redactSecrets } from "../lib/error-handling";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

const DEBUG_LEVELS = new Set(["debug", "trace"]);

const shouldLogDebug = (): boolean => {
  const read = (key: string): string | undefined =>
    process.env[key] ?? process.env[key.toLowerCase()];
  if (read("DEBUG") === "1") {
    return true;
  }
  return DEBUG_LEVELS.has((read("LOG_LEVEL") ?? "").toLowerCase());
};

export class ConsoleLogger implements Logger {
  info(msg: string): void {
    const out = this.prepare("info", msg);
    if (out === null) return;
    console.log(chalk.cyan("[INFO]"), out);
  }

  warn(msg: string): void {
    const out = this.prepare("warn", msg);
    if (out === null) return;
    console.warn(chalk.yellow("[WARN]"), out);
  }

  error(msg: string, err?: Error): void {
    const out = this.prepare("error", msg);
    if (out === null) return;
    console.error(
      chalk.red("[ERROR]"),
      out,
      err ? `\n${redactSecrets(err.stack ?? err.message)}` : "",
    );
  }

  debug(msg: string): void {
    if (!shouldLogDebug()) return;
    const out = this.prepare("debug", msg);
    if (out === null) return;
    console.debug(chalk.gray("[DEBUG]"), out);
  }

  private prepare(level: LogLevel, msg: string): string | null {
    const result = getLogDedupe().shouldEmit(level, msg);
    if (!result.emit) return null;
    const safe = redactSecrets(msg);
    return result.suffix ? `${safe} ${result.suffix}` : safe;
  }
}
