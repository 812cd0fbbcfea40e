import chalk from "chalk";
import fs from "fs-extra";
import path from "path";

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB

export interface LoggerOptions {
  logFile?: string | null;
  verbose?: boolean;
}

type Level = "INFO" | "SUCCESS" | "WARNING" | "ERROR" | "DEBUG" | "STABILITY";

/**
 * Console + file logger. Consecutive identical messages are collapsed into a
 * single "repeated N times" line once a different message arrives.
 */
class Logger {
  private logFile: string | null = null;
  private verbose = false;
  private lastMessage = "";
  private repeatCount = 0;

  configure(options: LoggerOptions): void {
    this.logFile = options.logFile ?? null;
    this.verbose = options.verbose ?? false;

    if (this.logFile) {
      fs.ensureDirSync(path.dirname(this.logFile));
    }
  }

  private getTimestamp(): string {
    const now = new Date();
    const date = now.toLocaleDateString("en-GB");
    const time = now.toLocaleTimeString("en-GB", { hour12: false });
    return `${date} ${time}`;
  }

  private format(level: Level, message: string): string {
    return `[+] wan-sentinel: ${this.getTimestamp()} - ${level}: ${message}`;
  }

  private writeToFile(line: string): void {
    if (!this.logFile) return;

    try {
      if (fs.existsSync(this.logFile)) {
        const stats = fs.statSync(this.logFile);
        if (stats.size > MAX_LOG_SIZE) {
          const rotated = path.join(
            path.dirname(this.logFile),
            `${path.basename(this.logFile, ".log")}-${Date.now()}.log`
          );
          fs.moveSync(this.logFile, rotated);
        }
      }
      fs.appendFileSync(this.logFile, line + "\n");
    } catch (e) {
      console.error("Failed to write to log file:", e);
    }
  }

  private emit(
    level: Level,
    message: string,
    colorFn: (s: string) => string,
    sink: (line: string) => void
  ): void {
    if (message === this.lastMessage) {
      this.repeatCount++;
      return;
    }

    this.flushRepeats();

    this.lastMessage = message;
    const formatted = this.format(level, message);
    sink(colorFn(formatted));
    this.writeToFile(formatted);
  }

  private flushRepeats(): void {
    if (this.repeatCount === 0) return;

    const statusMsg = this.format(
      "STABILITY",
      `(Previous message repeated ${this.repeatCount} times)`
    );
    console.log(chalk.gray(statusMsg));
    this.writeToFile(statusMsg);
    this.repeatCount = 0;
  }

  info(message: string): void {
    this.emit("INFO", message, chalk.white, console.log);
  }

  success(message: string): void {
    this.emit("SUCCESS", message, chalk.green, console.log);
  }

  warn(message: string): void {
    this.emit("WARNING", message, chalk.yellow, console.warn);
  }

  error(message: string): void {
    this.emit("ERROR", message, chalk.red, console.error);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.emit("DEBUG", message, chalk.gray, console.log);
    }
  }

}

export const logger = new Logger();
