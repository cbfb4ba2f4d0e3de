import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors";
import { DEFAULT_BACKOFF_MS, DEFAULT_RETRY_LIMIT } from "../core/retry";
import { LOG_LEVELS } from "../observability";
import { DEFAULT_BLOG_DOMAINS } from "../scan/classifier";
import { fillVars, stamp } from "./template";
import {
  CommonStageConfig,
  ConfigLoadOptions,
  ExtractStageConfig,
  FetchStageConfig,
  ScanStageConfig,
  TemplateVars,
} from "./types";

const DEFAULT_USER_AGENT = "shard-harvest/0.1";
const MIB = 1024 * 1024;
const KIB = 1024;

const commonSchema = z.object({
  workers: z.number().int().positive().default(4),
  logs_dir: z.string().min(1).optional(),
  log_file: z.string().min(1).optional(),
  log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

const fetchSchema = commonSchema.extend({
  urls_file: z.string().min(1),
  output_dir: z.string().min(1),
  retry_limit: z.number().int().positive().default(DEFAULT_RETRY_LIMIT),
  chunk_mb: z.number().int().positive().default(1),
  timeout_seconds: z.number().positive().default(60),
  backoff_seconds: z.number().nonnegative().default(DEFAULT_BACKOFF_MS / 1000),
  user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  ignore_https_errors: z.boolean().default(false),
});

const extractSchema = commonSchema.extend({
  input_dir: z.string().min(1),
  output_dir: z.string().min(1),
  delete_compressed: z.boolean().default(false),
  block_kb: z.number().int().positive().default(16),
});

const scanSchema = commonSchema.extend({
  input_jsonl: z.string().min(1),
  output_csv: z.string().min(1),
  min_text_length: z.number().int().nonnegative().default(0),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]).default("utf-8"),
  blog_domains: z.array(z.string().min(1)).nonempty().optional(),
});

function readStageDocument<T extends z.ZodTypeAny>(configPath: string, schema: T): z.output<T> {
  const absolutePath = path.resolve(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Config file not readable: ${absolutePath} (${errorMessage(error)})`, { cause: error });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid YAML: ${absolutePath} (${errorMessage(error)})`, { cause: error });
  }

  const result = schema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config ${absolutePath}: ${issues.join("; ")}`);
  }
  return result.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toLogLevel(value: string | undefined, fallback: CommonStageConfig["logLevel"]): CommonStageConfig["logLevel"] {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function resolveVars(options: ConfigLoadOptions): TemplateVars {
  return { timestamp: stamp(options.now), ...(options.vars ?? {}) };
}

function resolveCommon(
  document: z.output<typeof commonSchema>,
  vars: TemplateVars,
  options: ConfigLoadOptions,
  defaultLogFile: string,
): CommonStageConfig {
  const env = options.env ?? process.env;
  return {
    workers: options.workers ?? toInt(env.WORKERS, document.workers),
    logsDir: document.logs_dir ? fillVars(document.logs_dir, vars) : undefined,
    logFile: document.log_file ? fillVars(document.log_file, vars) : defaultLogFile,
    logLevel: toLogLevel(env.LOG_LEVEL, document.log_level),
  };
}

export function loadFetchConfig(configPath: string, options: ConfigLoadOptions = {}): FetchStageConfig {
  const document = readStageDocument(configPath, fetchSchema);
  const vars = resolveVars(options);
  const config: FetchStageConfig = {
    ...resolveCommon(document, vars, options, "fetch.log"),
    stage: "fetch",
    urlsSource: fillVars(document.urls_file, vars),
    outputDir: fillVars(document.output_dir, vars),
    retryLimit: document.retry_limit,
    chunkBytes: document.chunk_mb * MIB,
    timeoutMs: document.timeout_seconds * 1000,
    backoffMs: document.backoff_seconds * 1000,
    userAgent: document.user_agent,
    ignoreHttpsErrors: document.ignore_https_errors,
  };
  return Object.freeze(config);
}

export function loadExtractConfig(configPath: string, options: ConfigLoadOptions = {}): ExtractStageConfig {
  const document = readStageDocument(configPath, extractSchema);
  const vars = resolveVars(options);
  const config: ExtractStageConfig = {
    ...resolveCommon(document, vars, options, "extract.log"),
    stage: "extract",
    inputDir: fillVars(document.input_dir, vars),
    outputDir: fillVars(document.output_dir, vars),
    deleteCompressed: document.delete_compressed,
    blockBytes: document.block_kb * KIB,
  };
  return Object.freeze(config);
}

export function loadScanConfig(configPath: string, options: ConfigLoadOptions = {}): ScanStageConfig {
  const document = readStageDocument(configPath, scanSchema);
  const vars = resolveVars(options);
  const config: ScanStageConfig = {
    ...resolveCommon(document, vars, options, "scan.log"),
    stage: "scan",
    inputPath: fillVars(document.input_jsonl, vars),
    outputCsv: fillVars(document.output_csv, vars),
    minTextLength: document.min_text_length,
    encoding: document.encoding,
    blogDomains: document.blog_domains ?? DEFAULT_BLOG_DOMAINS,
  };
  return Object.freeze(config);
}
