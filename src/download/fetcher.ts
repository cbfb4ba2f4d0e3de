import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { request, Dispatcher } from "undici";
import { FetchStageConfig } from "../config";
import { FatalRunError, HttpStatusError, errorMessage, hasErrorCode } from "../core/errors";
import { ensureDir, fileSize } from "../core/fsUtils";
import { processWithConcurrency } from "../core/pool";
import { backoffDelay, createRetryPolicy, shouldRetry, RetryPolicy } from "../core/retry";
import { failedOutcome, summarizeOutcomes } from "../core/stageSummary";
import { Logger, MetricsRegistry } from "../observability";
import { StageSummary, TransferOutcome } from "../types";
import { getFetchDispatcher } from "./http";

export interface FetchShardOptions {
  dispatcher: Dispatcher;
  retry: RetryPolicy;
  chunkBytes: number;
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
}

interface FetcherDeps {
  config: FetchStageConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

async function isRegularFile(source: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(source)).isFile();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR", "ENAMETOOLONG")) {
      return false;
    }
    throw error;
  }
}

/** Reads one URL per line from a file, or splits an inline comma-separated list. */
export async function loadUrls(source: string): Promise<string[]> {
  if (await isRegularFile(source)) {
    const content = await fs.promises.readFile(source, "utf-8");
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"));
  }
  return source
    .split(",")
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}

export function fileNameFromUrl(url: string): string | undefined {
  if (!URL.canParse(url)) {
    return undefined;
  }
  const name = path.posix.basename(new URL(url).pathname);
  return name.length > 0 ? name : undefined;
}

async function downloadAttempt(url: string, destPath: string, options: FetchShardOptions): Promise<number> {
  const { statusCode, body } = await request(url, {
    method: "GET",
    headers: { "user-agent": options.userAgent },
    dispatcher: options.dispatcher,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
  });

  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new HttpStatusError(statusCode, url);
  }

  // A failed transfer leaves whatever was written in place; see DESIGN.md.
  const output = fs.createWriteStream(destPath, { highWaterMark: options.chunkBytes });
  await pipeline(body, output);
  return output.bytesWritten;
}

export async function fetchShard(url: string, destDir: string, options: FetchShardOptions): Promise<TransferOutcome> {
  const { logger, retry } = options;
  const fileName = fileNameFromUrl(url);
  if (!fileName) {
    logger.error("fetch_item_invalid_url", { item: url });
    return failedOutcome(url, "URL has no file name", 0);
  }

  const destPath = path.join(destDir, fileName);
  const existingSize = await fileSize(destPath);
  if (existingSize !== undefined && existingSize > 0) {
    logger.info("fetch_item_skipped", { item: url, file: fileName, reason: "already exists" });
    return { status: "skipped", item: url, reason: "already exists" };
  }

  let lastError: unknown;
  for (let attempt = 1; shouldRetry(attempt, retry.limit); attempt += 1) {
    const startedAt = Date.now();
    logger.debug("fetch_item_attempt_start", { item: url, attempt });
    try {
      const bytes = await downloadAttempt(url, destPath, options);
      logger.info("fetch_item_ok", { item: url, file: fileName, attempt, bytes, durationMs: Date.now() - startedAt });
      return { status: "completed", item: url, target: destPath, attempts: attempt };
    } catch (error) {
      lastError = error;
      logger.warn("fetch_item_error", {
        item: url,
        attempt,
        durationMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      if (shouldRetry(attempt + 1, retry.limit)) {
        await retry.sleep(backoffDelay(attempt, retry.baseDelayMs));
      }
    }
  }

  logger.error("fetch_item_failed", { item: url, attempts: retry.limit, error: errorMessage(lastError) });
  return failedOutcome(url, lastError, retry.limit);
}

export async function runFetcher(deps: FetcherDeps): Promise<StageSummary> {
  const { config, logger, metrics } = deps;
  const urls = await loadUrls(config.urlsSource);
  if (urls.length === 0) {
    throw new FatalRunError(`No URLs found in ${config.urlsSource}`);
  }

  const outputDir = path.resolve(config.outputDir);
  await ensureDir(outputDir);
  const options: FetchShardOptions = {
    dispatcher: deps.dispatcher ?? getFetchDispatcher(config.ignoreHttpsErrors),
    retry: createRetryPolicy({ limit: config.retryLimit, baseDelayMs: config.backoffMs, sleep: deps.sleep }),
    chunkBytes: config.chunkBytes,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    logger,
  };

  logger.info("fetch_start", { items: urls.length, outputDir, workers: config.workers });
  const outcomes = await processWithConcurrency(urls, config.workers, async (url) => {
    const stopTimer = metrics.startTimer("fetch_ms");
    let outcome: TransferOutcome;
    try {
      outcome = await fetchShard(url, outputDir, options);
    } catch (error) {
      logger.error("fetch_item_crashed", { item: url, error: errorMessage(error) });
      outcome = failedOutcome(url, error, 0);
    }
    stopTimer();
    metrics.recordOutcome("fetch", outcome);
    return outcome;
  });

  const summary = summarizeOutcomes("fetch", outcomes);
  logger.info("fetch_complete", { ...summary, outputDir });
  return summary;
}
