import { appendFileSync, writeFileSync } from "node:fs";

/** Controls how much reaches the console.
 *  "info":  status lines only.
 *  "debug": also the output of every command the pipeline runs. */
export type LogLevel = "info" | "debug";

export type LogEntryLevel = "info" | "success" | "warn" | "error" | "verbose";

export interface ILogger {
  /** Progress of a stage or step. */
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Command output. Always written to the log file, echoed to the console only at "debug". */
  verbose(message: string): void;
}

export interface LogEntry {
  level: LogEntryLevel;
  message: string;
}

export class InMemoryLogger implements ILogger {
  private entries: LogEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  success(message: string): void {
    this.entries.push({ level: "success", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  verbose(message: string): void {
    this.entries.push({ level: "verbose", message });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getMessages(level?: LogEntryLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}

/**
 * Append-only log file. Constructing one truncates the file and writes a
 * header line, so each provisioning run starts with a fresh log.
 */
export class FileLogger implements ILogger {
  constructor(
    private readonly filePath: string,
    header = "Provisioning started"
  ) {
    writeFileSync(this.filePath, `[${new Date().toISOString()}] === ${header} ===\n`);
  }

  info(message: string): void {
    this.writeLog("INFO", message);
  }

  success(message: string): void {
    this.writeLog("OK", message);
  }

  warn(message: string): void {
    this.writeLog("WARN", message);
  }

  error(message: string): void {
    this.writeLog("ERROR", message);
  }

  verbose(message: string): void {
    this.writeLog("OUT", message);
  }

  getFilePath(): string {
    return this.filePath;
  }

  private writeLog(label: string, message: string): void {
    const timestamp = new Date().toISOString();
    appendFileSync(this.filePath, `[${timestamp}] [${label}] ${message}\n`);
  }
}

const RED = "\x1b[0;31m";
const GREEN = "\x1b[0;32m";
const YELLOW = "\x1b[1;33m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface ConsoleLoggerOptions {
  logLevel?: LogLevel;
  colors?: boolean;
}

export class ConsoleLogger implements ILogger {
  private readonly logLevel: LogLevel;
  private readonly colors: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.logLevel = options.logLevel ?? "info";
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  info(message: string): void {
    console.log(this.paint(YELLOW, message));
  }

  success(message: string): void {
    console.log(this.paint(GREEN, message));
  }

  warn(message: string): void {
    console.warn(this.paint(YELLOW, `Warning: ${message}`));
  }

  error(message: string): void {
    console.error(this.paint(RED, message));
  }

  verbose(message: string): void {
    if (this.logLevel !== "debug") {
      return;
    }
    console.log(this.paint(DIM, message));
  }

  private paint(color: string, message: string): string {
    return this.colors ? `${color}${message}${RESET}` : message;
  }
}

/** Fans every entry out to several loggers, e.g. console and log file. */
export class TeeLogger implements ILogger {
  constructor(private readonly loggers: readonly ILogger[]) {}

  info(message: string): void {
    this.loggers.forEach((logger) => logger.info(message));
  }

  success(message: string): void {
    this.loggers.forEach((logger) => logger.success(message));
  }

  warn(message: string): void {
    this.loggers.forEach((logger) => logger.warn(message));
  }

  error(message: string): void {
    this.loggers.forEach((logger) => logger.error(message));
  }

  verbose(message: string): void {
    this.loggers.forEach((logger) => logger.verbose(message));
  }
}

/** Log command output one line at a time, dropping blank lines. */
export function logOutput(logger: ILogger, chunk: string): void {
  for (const line of chunk.split(/\r?\n/)) {
    if (line.trim() !== "") {
      logger.verbose(line.trimEnd());
    }
  }
}
