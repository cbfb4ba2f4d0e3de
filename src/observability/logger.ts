import fs from "node:fs";
import path from "node:path";
import { LogFields, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LogWriter {
  write(level: LogLevel, line: string): void;
  close(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  writers?: LogWriter[];
}

export class ConsoleLogWriter implements LogWriter {
  write(level: LogLevel, line: string): void {
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }

  async close(): Promise<void> {
    return Promise.resolve();
  }
}

/** Appends every line to a job log file, creating its directory on first use. */
export class FileLogWriter implements LogWriter {
  private readonly stream: fs.WriteStream;

  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.stream = fs.createWriteStream(filePath, { flags: "a", encoding: "utf-8" });
  }

  write(_level: LogLevel, line: string): void {
    this.stream.write(`${line}\n`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: LogLevel;
  private readonly writers: LogWriter[];

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.level ?? "info";
    this.writers = options.writers ?? [new ConsoleLogWriter()];
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  async close(): Promise<void> {
    await Promise.all(this.writers.map((writer) => writer.close()));
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    for (const writer of this.writers) {
      writer.write(level, line);
    }
  }
}

export interface StageLoggerOptions {
  runId: string;
  component: string;
  level: LogLevel;
  logFilePath?: string;
  consoleWriter?: LogWriter;
}

export function createStageLogger(options: StageLoggerOptions): Logger {
  const writers: LogWriter[] = [options.consoleWriter ?? new ConsoleLogWriter()];
  if (options.logFilePath) {
    writers.push(new FileLogWriter(options.logFilePath));
  }
  return new Logger({ component: options.component, runId: options.runId }, { level: options.level, writers });
}
