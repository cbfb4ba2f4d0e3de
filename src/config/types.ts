import { LogLevel } from "../observability/types";

export interface CommonStageConfig {
  readonly workers: number;
  readonly logsDir?: string;
  readonly logFile: string;
  readonly logLevel: LogLevel;
}

export interface FetchStageConfig extends CommonStageConfig {
  readonly stage: "fetch";
  /** Path to a newline-delimited URL file, or an inline comma-separated list. */
  readonly urlsSource: string;
  readonly outputDir: string;
  readonly retryLimit: number;
  readonly chunkBytes: number;
  readonly timeoutMs: number;
  readonly backoffMs: number;
  readonly userAgent: string;
  readonly ignoreHttpsErrors: boolean;
}

export interface ExtractStageConfig extends CommonStageConfig {
  readonly stage: "extract";
  readonly inputDir: string;
  readonly outputDir: string;
  readonly deleteCompressed: boolean;
  readonly blockBytes: number;
}

export type CsvEncoding = "utf-8" | "utf8" | "latin1" | "ascii" | "utf16le";

export interface ScanStageConfig extends CommonStageConfig {
  readonly stage: "scan";
  readonly inputPath: string;
  readonly outputCsv: string;
  readonly minTextLength: number;
  readonly encoding: CsvEncoding;
  readonly blogDomains: readonly string[];
}

export type StageConfig = FetchStageConfig | ExtractStageConfig | ScanStageConfig;

export type TemplateVars = Record<string, string>;

export interface ConfigLoadOptions {
  vars?: TemplateVars;
  now?: Date;
  env?: NodeJS.ProcessEnv;
  workers?: number;
}
