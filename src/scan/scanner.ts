import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { z } from "zod";
import { ScanStageConfig } from "../config";
import { FatalRunError, PipelineError, errorMessage, isNotFoundError } from "../core/errors";
import { processWithConcurrency } from "../core/pool";
import { failedOutcome, summarizeOutcomes } from "../core/stageSummary";
import { Logger, MetricsRegistry } from "../observability";
import { createSink, RecordSink } from "../sink";
import { CorpusRecord, ScanOutcome, ScanResult, StageSummary } from "../types";
import { createUrlClassifier, UrlClassifier } from "./classifier";

export const RECORD_FILE_SUFFIX = ".jsonl";

const optionalText = z.string().nullish();
const optionalScalar = z.union([z.string(), z.number(), z.boolean()]).nullish();

const rawRecordSchema = z.object({
  id: optionalScalar,
  text: optionalText,
  created: optionalScalar,
  added: optionalScalar,
  source: optionalScalar,
  metadata: z.object({ url: optionalText }).nullish(),
});

type RawRecord = z.output<typeof rawRecordSchema>;

type LineParse = { ok: true; record: RawRecord } | { ok: false; error: string };

/** A file that failed partway. `progress` counts what was read and written before the failure. */
export class ScanFileError extends PipelineError {
  readonly progress: ScanResult;

  constructor(progress: ScanResult, cause: unknown) {
    super(errorMessage(cause), { cause });
    this.progress = progress;
  }
}

export interface ScanFileOptions {
  minTextLength: number;
  classify: UrlClassifier;
  logger: Logger;
}

interface ScannerDeps {
  config: ScanStageConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: RecordSink;
}

export function parseRecordLine(line: string): LineParse {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const result = rawRecordSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, error: result.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { ok: true, record: result.data };
}

/** Counts code points, not UTF-16 units, and stops as soon as `min` is reached. */
export function hasMinLength(text: string, min: number): boolean {
  if (text.length < min) {
    return false;
  }
  let count = 0;
  for (const _char of text) {
    count += 1;
    if (count >= min) {
      return true;
    }
  }
  return count >= min;
}

function scalarText(value: string | number | boolean | null | undefined): string {
  return value === null || value === undefined ? "" : String(value);
}

export function normalizeText(text: string): string {
  return text.trim().replace(/\r\n|\r|\n/g, " ");
}

/** Returns the CSV-ready record when the raw record passes every keep rule. */
export function selectRecord(raw: RawRecord, minTextLength: number, classify: UrlClassifier): CorpusRecord | undefined {
  const url = raw.metadata?.url ?? "";
  const text = raw.text ?? "";
  if (!url || !text) {
    return undefined;
  }
  if (!hasMinLength(text, minTextLength)) {
    return undefined;
  }
  if (!classify(url)) {
    return undefined;
  }

  return {
    id: scalarText(raw.id),
    url,
    created: scalarText(raw.created),
    added: scalarText(raw.added),
    source: scalarText(raw.source),
    text: normalizeText(text),
  };
}

export async function scanFile(inputFile: string, sink: RecordSink, options: ScanFileOptions): Promise<ScanResult> {
  const { logger } = options;
  const input = fs.createReadStream(inputFile, { encoding: "utf-8" });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  let linesSeen = 0;
  let recordsKept = 0;
  try {
    for await (const line of lines) {
      linesSeen += 1;
      const parsed = parseRecordLine(line);
      if (!parsed.ok) {
        logger.warn("scan_line_malformed", { file: inputFile, line: linesSeen, error: parsed.error });
        continue;
      }

      const record = selectRecord(parsed.record, options.minTextLength, options.classify);
      if (!record) {
        continue;
      }
      await sink.write(record);
      recordsKept += 1;
    }
  } catch (error) {
    throw new ScanFileError({ linesSeen, recordsKept }, error);
  } finally {
    lines.close();
    input.destroy();
  }

  logger.info("scan_file_complete", { file: inputFile, linesSeen, recordsKept });
  return { linesSeen, recordsKept };
}

async function walkRecordFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkRecordFiles(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(RECORD_FILE_SUFFIX)) {
      files.push(entryPath);
    }
  }
  return files;
}

/** A single record file, or every `.jsonl` file under a directory tree, sorted by path. */
export async function listRecordFiles(inputPath: string): Promise<string[]> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(inputPath);
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new FatalRunError(`Input path not found: ${inputPath}`, { cause: error });
    }
    throw error;
  }

  if (stats.isFile()) {
    return [inputPath];
  }
  return (await walkRecordFiles(inputPath)).sort();
}

export async function runScanner(deps: ScannerDeps): Promise<StageSummary> {
  const { config, logger, metrics } = deps;
  const inputPath = path.resolve(config.inputPath);
  const files = await listRecordFiles(inputPath);
  if (files.length === 0) {
    throw new FatalRunError(`No ${RECORD_FILE_SUFFIX} files found in ${inputPath}`);
  }

  const outputCsv = path.resolve(config.outputCsv);
  const sink = deps.sink ?? createSink({ ...config, outputCsv });
  const options: ScanFileOptions = {
    minTextLength: config.minTextLength,
    classify: createUrlClassifier(config.blogDomains),
    logger,
  };

  logger.info("scan_start", { items: files.length, inputPath, outputCsv, workers: config.workers });
  let outcomes: ScanOutcome[];
  try {
    outcomes = await processWithConcurrency(files, config.workers, async (file): Promise<ScanOutcome> => {
      const stopTimer = metrics.startTimer("scan_ms");
      try {
        const result = await scanFile(file, sink, options);
        metrics.incrementCounter("scan_completed");
        metrics.incrementCounter("scan_lines_seen", result.linesSeen);
        metrics.incrementCounter("scan_records_kept", result.recordsKept);
        return { status: "completed", item: file, target: outputCsv, attempts: 1, ...result };
      } catch (error) {
        const progress: ScanResult = error instanceof ScanFileError ? error.progress : { linesSeen: 0, recordsKept: 0 };
        logger.error("scan_file_failed", { file, error: errorMessage(error), ...progress });
        metrics.incrementCounter("scan_failed");
        metrics.incrementCounter("scan_lines_seen", progress.linesSeen);
        metrics.incrementCounter("scan_records_kept", progress.recordsKept);
        return { ...failedOutcome(file, error, 1), ...progress };
      } finally {
        stopTimer();
      }
    });
  } finally {
    await sink.close();
  }

  let linesSeen = 0;
  let recordsKept = 0;
  // Rows a failed file wrote before failing stay in the CSV, so they count here too.
  for (const outcome of outcomes) {
    linesSeen += outcome.linesSeen;
    recordsKept += outcome.recordsKept;
  }
  const summary: StageSummary = { ...summarizeOutcomes("scan", outcomes), linesSeen, recordsKept };
  logger.info("scan_complete", { ...summary, outputCsv });
  return summary;
}
