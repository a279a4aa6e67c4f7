import * as fs from "fs";
import * as path from "path";

enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
  SUCCESS = "SUCCESS",
}

class Logger {
  private logFile: string | null;
  private debugEnabled: boolean;

  constructor() {
    // Tests never touch the filesystem
    this.logFile =
      process.env.NODE_ENV === "test"
        ? null
        : path.join(process.cwd(), process.env.LOG_FILE || "sqlite-agent.log");
    this.debugEnabled = process.env.LOG_LEVEL === "debug";
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  private colorize(level: LogLevel, message: string): string {
    const colors = {
      [LogLevel.DEBUG]: "\x1b[90m", // Grey
      [LogLevel.INFO]: "\x1b[36m", // Cyan
      [LogLevel.WARN]: "\x1b[33m", // Yellow
      [LogLevel.ERROR]: "\x1b[31m", // Red
      [LogLevel.SUCCESS]: "\x1b[32m", // Green
    };
    const reset = "\x1b[0m";
    return `${colors[level]}${message}${reset}`;
  }

  private writeToFile(formattedMessage: string) {
    if (!this.logFile) return;
    fs.appendFileSync(this.logFile, formattedMessage + "\n");
  }

  debug(msg: string) {
    if (!this.debugEnabled) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, msg);
    console.debug(this.colorize(LogLevel.DEBUG, formatted));
    this.writeToFile(formatted);
  }

  info(msg: string) {
    const formatted = this.formatMessage(LogLevel.INFO, msg);
    console.log(this.colorize(LogLevel.INFO, formatted));
    this.writeToFile(formatted);
  }

  success(msg: string) {
    const formatted = this.formatMessage(LogLevel.SUCCESS, msg);
    console.log(this.colorize(LogLevel.SUCCESS, formatted));
    this.writeToFile(formatted);
  }

  warn(msg: string) {
    const formatted = this.formatMessage(LogLevel.WARN, msg);
    console.warn(this.colorize(LogLevel.WARN, formatted));
    this.writeToFile(formatted);
  }

  error(msg: string, err?: unknown) {
    const errorMessage =
      err === undefined ? msg : `${msg} | ${describeError(err)}`;
    const formatted = this.formatMessage(LogLevel.ERROR, errorMessage);
    console.error(this.colorize(LogLevel.ERROR, formatted));
    this.writeToFile(formatted);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export const logger = new Logger();
