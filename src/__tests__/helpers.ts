import { once } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { finished } from "node:stream/promises";
import { Logger, LogLevel, LogWriter } from "../observability";

export type LogEntry = Record<string, unknown> & { msg: string; level: LogLevel };

export class MemoryLogWriter implements LogWriter {
  readonly lines: string[] = [];

  write(_level: LogLevel, line: string): void {
    this.lines.push(line);
  }

  async close(): Promise<void> {
    return Promise.resolve();
  }

  entries(): LogEntry[] {
    return this.lines.map((line) => JSON.parse(line));
  }

  find(msg: string): LogEntry[] {
    return this.entries().filter((entry) => entry.msg === msg);
  }
}

export function createTestLogger(writer = new MemoryLogWriter(), level: LogLevel = "debug"): Logger {
  return new Logger({ component: "test", runId: "run_test" }, { level, writers: [writer] });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `shard-harvest-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];

/**
 * Builds a single-segment zstd frame holding `content` as one raw (stored) block.
 * Enough for decoder tests without a zstd encoder at hand.
 */
export function zstdFrame(content: Buffer): Buffer {
  const size = content.length;
  let header: Buffer;
  if (size <= 0xff) {
    header = Buffer.from([...ZSTD_MAGIC, 0x20, size]);
  } else if (size <= 0xffff + 256) {
    header = Buffer.alloc(7);
    header.set([...ZSTD_MAGIC, 0x60]);
    header.writeUInt16LE(size - 256, 5);
  } else {
    throw new Error(`zstdFrame supports up to ${0xffff + 256} bytes`);
  }

  const blockHeader = Buffer.alloc(3);
  blockHeader.writeUIntLE(1 | (size << 3), 0, 3);
  return Buffer.concat([header, blockHeader, content]);
}

function residentBytes(): number {
  const usage = process.memoryUsage();
  return usage.heapUsed + usage.arrayBuffers;
}

/** Highest heap plus buffer growth seen while `run` is pending, sampled every few milliseconds. */
export async function measurePeakMemoryGrowth(run: () => Promise<unknown>): Promise<number> {
  const baseline = residentBytes();
  let peak = baseline;
  const timer = setInterval(() => {
    peak = Math.max(peak, residentBytes());
  }, 5);
  try {
    await run();
  } finally {
    clearInterval(timer);
  }
  return Math.max(peak, residentBytes()) - baseline;
}

/** Writes `line` plus a newline `count` times, waiting on drain. */
export async function writeRepeatedLines(file: string, line: string, count: number): Promise<void> {
  const output = fs.createWriteStream(file);
  const chunk = `${line}\n`;
  for (let index = 0; index < count; index += 1) {
    if (!output.write(chunk)) {
      await once(output, "drain");
    }
  }
  output.end();
  await finished(output);
}
