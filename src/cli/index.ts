import { Dispatcher } from "undici";
import {
  loadExtractConfig,
  loadFetchConfig,
  loadScanConfig,
  parseVarAssignments,
  stamp,
  ConfigLoadOptions,
  TemplateVars,
} from "../config";
import { runPipeline, PipelinePlan } from "../core/commands";
import { ConfigError, PipelineError } from "../core/errors";
import { ConsoleLogWriter, Logger, MetricsRegistry, createRunId, LogWriter } from "../observability";
import { StageName } from "../types";

export type CommandName = StageName | "run";

export interface ParsedCliArgs {
  command: CommandName;
  stages: StageName[];
  configPaths: Record<StageName, string>;
  vars: TemplateVars;
  workers?: number;
}

export interface CliDependencies {
  now?: Date;
  env?: NodeJS.ProcessEnv;
  consoleWriter?: LogWriter;
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

const ALL_STAGES: readonly StageName[] = ["fetch", "extract", "scan"];

const HELP_TEXT = `
Usage:
  shard-harvest <command> [options]

Commands:
  fetch      Download shard files listed in urls_file
  extract    Decompress .zst and .gz shards into .json.jsonl files
  scan       Filter blog records from .jsonl files into one CSV
  run        Run fetch, extract and scan in order

Options:
  --config <path>          Stage config for fetch/extract/scan (default configs/<stage>.yaml)
  --fetch-config <path>    Fetch config for run
  --extract-config <path>  Extract config for run
  --scan-config <path>     Scan config for run
  --stages <list>          Comma-separated stages for run (default fetch,extract,scan)
  --vars <k=v> [k=v ...]   Template variables substituted into config paths
  --workers <n>            Override the worker count of every stage
  -h, --help               Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "fetch" || raw === "extract" || raw === "scan" || raw === "run") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

function varsValues(argv: string[]): string[] {
  const index = argv.indexOf("--vars");
  if (index < 0) {
    return [];
  }
  const values: string[] = [];
  for (let cursor = index + 1; cursor < argv.length && !argv[cursor].startsWith("--"); cursor += 1) {
    values.push(argv[cursor]);
  }
  return values;
}

function parseStages(raw: string | undefined): StageName[] {
  if (raw === undefined) {
    return [...ALL_STAGES];
  }
  const requested = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  const stages: StageName[] = [];
  for (const value of requested) {
    const stage = ALL_STAGES.find((candidate) => candidate === value);
    if (!stage) {
      throw new ConfigError(`Unknown stage "${value}", expected one of ${ALL_STAGES.join(", ")}`);
    }
    stages.push(stage);
  }
  if (stages.length === 0) {
    throw new ConfigError("--stages must name at least one stage");
  }
  return ALL_STAGES.filter((stage) => stages.includes(stage));
}

function parseWorkers(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new ConfigError(`--workers must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const configPaths: Record<StageName, string> = {
    fetch: optionValue(argv, "--fetch-config") ?? "configs/fetch.yaml",
    extract: optionValue(argv, "--extract-config") ?? "configs/extract.yaml",
    scan: optionValue(argv, "--scan-config") ?? "configs/scan.yaml",
  };

  const stages = command === "run" ? parseStages(optionValue(argv, "--stages")) : [command];
  if (command !== "run") {
    configPaths[command] = optionValue(argv, "--config") ?? configPaths[command];
  }

  return {
    command,
    stages,
    configPaths,
    vars: parseVarAssignments(varsValues(argv)),
    workers: parseWorkers(optionValue(argv, "--workers")),
  };
}

function loadPlan(parsed: ParsedCliArgs, options: ConfigLoadOptions): PipelinePlan {
  const plan: PipelinePlan = {};
  for (const stage of parsed.stages) {
    switch (stage) {
      case "fetch":
        plan.fetch = loadFetchConfig(parsed.configPaths.fetch, options);
        break;
      case "extract":
        plan.extract = loadExtractConfig(parsed.configPaths.extract, options);
        break;
      case "scan":
        plan.scan = loadScanConfig(parsed.configPaths.scan, options);
        break;
    }
  }
  return plan;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const consoleWriter = deps.consoleWriter ?? new ConsoleLogWriter();
  const now = deps.now ?? new Date();
  const runId = createRunId(now);
  const logger = new Logger({ component: "cli", runId }, { writers: [consoleWriter] });

  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("command_invalid", { error: error.message });
      return 1;
    }
    throw error;
  }
  if (parsed === "help") {
    console.log(getHelpText());
    return 0;
  }

  const args: ParsedCliArgs = parsed;
  const metrics = new MetricsRegistry();
  const timestamp = stamp(now);
  // Stages of one run share a stamp so later inputs can name earlier outputs; --vars overrides it.
  const vars: TemplateVars = { fetch_timestamp: timestamp, extract_timestamp: timestamp, ...args.vars };

  logger.info("command_start", {
    command: args.command,
    stages: args.stages,
    configPaths: args.stages.map((stage) => args.configPaths[stage]),
    vars,
    workers: args.workers,
  });

  try {
    const plan = loadPlan(args, { vars, now, env: deps.env, workers: args.workers });
    const summaries = await runPipeline(
      { runId, metrics, consoleWriter, dispatcher: deps.dispatcher, sleep: deps.sleep },
      plan,
    );
    for (const summary of summaries) {
      logger.info("stage_summary", { ...summary });
    }
    logger.info("command_complete", { command: args.command });
    return 0;
  } catch (error) {
    if (error instanceof PipelineError) {
      logger.error("command_failed", { command: args.command, error: error.message });
      return 1;
    }
    throw error;
  } finally {
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
