import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { ExtractStageConfig } from "../config";
import { FatalRunError, errorMessage, isNotFoundError } from "../core/errors";
import { ensureDir, pathExists } from "../core/fsUtils";
import { processWithConcurrency } from "../core/pool";
import { failedOutcome, summarizeOutcomes } from "../core/stageSummary";
import { Logger, MetricsRegistry } from "../observability";
import { StageSummary, TransferOutcome } from "../types";
import { createDecompressor, deriveOutputName, isCompressedShard } from "./formats";

export const DEFAULT_BLOCK_BYTES = 16 * 1024;

export interface ExtractShardOptions {
  deleteSource: boolean;
  blockBytes?: number;
  logger: Logger;
}

interface ExtractorDeps {
  config: ExtractStageConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export async function listCompressedShards(inputDir: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(inputDir, { withFileTypes: true });
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new FatalRunError(`Input directory not found: ${inputDir}`, { cause: error });
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && isCompressedShard(entry.name))
    .map((entry) => path.join(inputDir, entry.name))
    .sort();
}

async function removePartialOutput(destPath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(destPath, { force: true });
  } catch (error) {
    logger.warn("extract_partial_cleanup_failed", { file: destPath, error: errorMessage(error) });
  }
}

/**
 * Decompresses one shard into `destDir`. Not retried: a corrupt or truncated archive fails the
 * same way every time.
 */
export async function extractShard(srcFile: string, destDir: string, options: ExtractShardOptions): Promise<TransferOutcome> {
  const { logger } = options;
  const blockBytes = options.blockBytes ?? DEFAULT_BLOCK_BYTES;
  const fileName = path.basename(srcFile);
  const output = deriveOutputName(fileName);

  if (output.kind === "decompressed") {
    logger.info("extract_item_skipped", { item: srcFile, reason: "already decompressed" });
    return { status: "skipped", item: srcFile, reason: "already decompressed" };
  }
  if (output.kind === "unrecognized") {
    logger.info("extract_item_skipped", { item: srcFile, reason: "unrecognized" });
    return { status: "skipped", item: srcFile, reason: "unrecognized" };
  }

  const destPath = path.join(destDir, output.name);
  if (await pathExists(destPath)) {
    logger.info("extract_item_skipped", { item: srcFile, file: output.name, reason: "already exists" });
    return { status: "skipped", item: srcFile, reason: "already exists" };
  }

  const startedAt = Date.now();
  try {
    await pipeline(
      fs.createReadStream(srcFile, { highWaterMark: blockBytes }),
      createDecompressor(output.format, blockBytes),
      fs.createWriteStream(destPath, { highWaterMark: blockBytes }),
    );
  } catch (error) {
    logger.error("extract_item_failed", { item: srcFile, format: output.format, error: errorMessage(error) });
    await removePartialOutput(destPath, logger);
    return failedOutcome(srcFile, error, 1);
  }

  logger.info("extract_item_ok", {
    item: srcFile,
    file: output.name,
    format: output.format,
    durationMs: Date.now() - startedAt,
  });

  if (options.deleteSource) {
    try {
      await fs.promises.unlink(srcFile);
      logger.info("extract_source_deleted", { item: srcFile });
    } catch (error) {
      logger.warn("extract_source_delete_failed", { item: srcFile, error: errorMessage(error) });
    }
  }

  return { status: "completed", item: srcFile, target: destPath, attempts: 1 };
}

export async function runExtractor(deps: ExtractorDeps): Promise<StageSummary> {
  const { config, logger, metrics } = deps;
  const inputDir = path.resolve(config.inputDir);
  const shards = await listCompressedShards(inputDir);
  if (shards.length === 0) {
    throw new FatalRunError(`No compressed files in ${inputDir}`);
  }

  const outputDir = path.resolve(config.outputDir);
  await ensureDir(outputDir);
  logger.info("extract_start", { items: shards.length, inputDir, outputDir, workers: config.workers });

  const outcomes = await processWithConcurrency(shards, config.workers, async (shard) => {
    const stopTimer = metrics.startTimer("extract_ms");
    let outcome: TransferOutcome;
    try {
      outcome = await extractShard(shard, outputDir, {
        deleteSource: config.deleteCompressed,
        blockBytes: config.blockBytes,
        logger,
      });
    } catch (error) {
      logger.error("extract_item_crashed", { item: shard, error: errorMessage(error) });
      outcome = failedOutcome(shard, error, 1);
    }
    stopTimer();
    metrics.recordOutcome("extract", outcome);
    return outcome;
  });

  const summary = summarizeOutcomes("extract", outcomes);
  logger.info("extract_complete", { ...summary, outputDir });
  return summary;
}
