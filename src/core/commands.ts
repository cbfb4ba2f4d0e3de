import path from "node:path";
import { Dispatcher } from "undici";
import { ExtractStageConfig, FetchStageConfig, ScanStageConfig, StageConfig } from "../config";
import { runFetcher } from "../download/fetcher";
import { runExtractor } from "../extract/extractor";
import { createStageLogger, LogWriter, Logger, MetricsRegistry } from "../observability";
import { runScanner } from "../scan/scanner";
import { StageSummary } from "../types";
import { errorMessage } from "./errors";

export interface CommandContext {
  runId: string;
  metrics: MetricsRegistry;
  consoleWriter?: LogWriter;
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

export interface PipelinePlan {
  fetch?: FetchStageConfig;
  extract?: ExtractStageConfig;
  scan?: ScanStageConfig;
}

async function withStageLogger(
  ctx: CommandContext,
  config: StageConfig,
  run: (logger: Logger) => Promise<StageSummary>,
): Promise<StageSummary> {
  const logger = createStageLogger({
    runId: ctx.runId,
    component: config.stage,
    level: config.logLevel,
    logFilePath: config.logsDir ? path.join(config.logsDir, config.logFile) : undefined,
    consoleWriter: ctx.consoleWriter,
  });

  try {
    return await run(logger);
  } catch (error) {
    logger.error("stage_failed", { stage: config.stage, error: errorMessage(error) });
    throw error;
  } finally {
    await logger.close();
  }
}

export async function runFetch(ctx: CommandContext, config: FetchStageConfig): Promise<StageSummary> {
  return withStageLogger(ctx, config, (logger) =>
    runFetcher({
      config,
      logger,
      metrics: ctx.metrics,
      dispatcher: ctx.dispatcher,
      sleep: ctx.sleep,
    }),
  );
}

export async function runExtract(ctx: CommandContext, config: ExtractStageConfig): Promise<StageSummary> {
  return withStageLogger(ctx, config, (logger) => runExtractor({ config, logger, metrics: ctx.metrics }));
}

export async function runScan(ctx: CommandContext, config: ScanStageConfig): Promise<StageSummary> {
  return withStageLogger(ctx, config, (logger) => runScanner({ config, logger, metrics: ctx.metrics }));
}

/** Runs the planned stages in fetch, extract, scan order. A fatal stage error stops the rest. */
export async function runPipeline(ctx: CommandContext, plan: PipelinePlan): Promise<StageSummary[]> {
  const summaries: StageSummary[] = [];
  if (plan.fetch) {
    summaries.push(await runFetch(ctx, plan.fetch));
  }
  if (plan.extract) {
    summaries.push(await runExtract(ctx, plan.extract));
  }
  if (plan.scan) {
    summaries.push(await runScan(ctx, plan.scan));
  }
  return summaries;
}
