import fs from "node:fs";
import path from "node:path";
import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FetchStageConfig } from "../../config";
import { FatalRunError } from "../../core/errors";
import { createRetryPolicy } from "../../core/retry";
import { MetricsRegistry } from "../../observability";
import { MemoryLogWriter, createTestLogger, makeTempDir, removeTempDir } from "../../__tests__/helpers";
import { fetchShard, fileNameFromUrl, loadUrls, runFetcher, FetchShardOptions } from "../fetcher";

const ORIGIN = "https://shards.test";

describe("loadUrls", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("urls");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("reads one URL per line and skips blanks and comments", async () => {
    const file = path.join(dir, "urls.txt");
    await fs.promises.writeFile(file, `# shards\n${ORIGIN}/a.gz\n\n  ${ORIGIN}/b.zst  \r\n# done\n`);

    expect(await loadUrls(file)).toEqual([`${ORIGIN}/a.gz`, `${ORIGIN}/b.zst`]);
  });

  it("splits an inline comma-separated list", async () => {
    expect(await loadUrls(`${ORIGIN}/a.gz, ${ORIGIN}/b.zst,`)).toEqual([`${ORIGIN}/a.gz`, `${ORIGIN}/b.zst`]);
  });
});

describe("fileNameFromUrl", () => {
  it("takes the last path segment", () => {
    expect(fileNameFromUrl(`${ORIGIN}/data/part-0.jsonl.zst?sig=abc`)).toBe("part-0.jsonl.zst");
  });

  it("returns undefined without a file name", () => {
    expect(fileNameFromUrl(`${ORIGIN}/`)).toBeUndefined();
    expect(fileNameFromUrl("no url")).toBeUndefined();
  });
});

describe("fetchShard", () => {
  let dir: string;
  let agent: MockAgent;
  let writer: MemoryLogWriter;
  let delays: number[];

  function options(limit = 3): FetchShardOptions {
    return {
      dispatcher: agent,
      retry: createRetryPolicy({
        limit,
        baseDelayMs: 10,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }),
      chunkBytes: 1024,
      timeoutMs: 1000,
      userAgent: "test-agent",
      logger: createTestLogger(writer),
    };
  }

  beforeEach(async () => {
    dir = await makeTempDir("fetch");
    agent = new MockAgent();
    agent.disableNetConnect();
    writer = new MemoryLogWriter();
    delays = [];
  });

  afterEach(async () => {
    await agent.close();
    await removeTempDir(dir);
  });

  it("downloads a shard into the destination directory", async () => {
    agent.get(ORIGIN).intercept({ path: "/data/a.jsonl.gz", method: "GET" }).reply(200, "payload");

    const outcome = await fetchShard(`${ORIGIN}/data/a.jsonl.gz`, dir, options());

    expect(outcome).toEqual({
      status: "completed",
      item: `${ORIGIN}/data/a.jsonl.gz`,
      target: path.join(dir, "a.jsonl.gz"),
      attempts: 1,
    });
    expect(await fs.promises.readFile(path.join(dir, "a.jsonl.gz"), "utf-8")).toBe("payload");
    expect(delays).toEqual([]);
  });

  it("skips a file that already exists with content", async () => {
    await fs.promises.writeFile(path.join(dir, "a.jsonl.gz"), "old");

    const outcome = await fetchShard(`${ORIGIN}/data/a.jsonl.gz`, dir, options());

    expect(outcome).toEqual({ status: "skipped", item: `${ORIGIN}/data/a.jsonl.gz`, reason: "already exists" });
    expect(await fs.promises.readFile(path.join(dir, "a.jsonl.gz"), "utf-8")).toBe("old");
  });

  it("downloads again over an empty leftover file", async () => {
    await fs.promises.writeFile(path.join(dir, "a.jsonl.gz"), "");
    agent.get(ORIGIN).intercept({ path: "/a.jsonl.gz", method: "GET" }).reply(200, "fresh");

    const outcome = await fetchShard(`${ORIGIN}/a.jsonl.gz`, dir, options());

    expect(outcome.status).toBe("completed");
    expect(await fs.promises.readFile(path.join(dir, "a.jsonl.gz"), "utf-8")).toBe("fresh");
  });

  it("retries transient failures with linear backoff", async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/b.zst", method: "GET" }).reply(503, "busy");
    pool.intercept({ path: "/b.zst", method: "GET" }).replyWithError(new Error("socket reset"));
    pool.intercept({ path: "/b.zst", method: "GET" }).reply(200, "zstd bytes");

    const outcome = await fetchShard(`${ORIGIN}/b.zst`, dir, options(5));

    expect(outcome).toEqual({ status: "completed", item: `${ORIGIN}/b.zst`, target: path.join(dir, "b.zst"), attempts: 3 });
    expect(delays).toEqual([10, 20]);
    expect(writer.find("fetch_item_error").map((entry) => entry.attempt)).toEqual([1, 2]);
  });

  it("gives up after exactly the retry limit", async () => {
    agent.get(ORIGIN).intercept({ path: "/missing.gz", method: "GET" }).reply(404, "nope").times(3);

    const outcome = await fetchShard(`${ORIGIN}/missing.gz`, dir, options(3));

    expect(outcome).toEqual({
      status: "failed",
      item: `${ORIGIN}/missing.gz`,
      error: `HTTP 404 for ${ORIGIN}/missing.gz`,
      attempts: 3,
    });
    expect(delays).toEqual([10, 20]);
    expect(writer.find("fetch_item_error")).toHaveLength(3);
    expect(writer.find("fetch_item_failed")).toHaveLength(1);
    expect(fs.existsSync(path.join(dir, "missing.gz"))).toBe(false);
  });

  it("fails a URL without a file name without any attempt", async () => {
    const outcome = await fetchShard(`${ORIGIN}/`, dir, options());

    expect(outcome).toEqual({ status: "failed", item: `${ORIGIN}/`, error: "URL has no file name", attempts: 0 });
  });
});

describe("runFetcher", () => {
  let dir: string;
  let agent: MockAgent;

  function fetchConfig(urlsSource: string, overrides: Partial<FetchStageConfig> = {}): FetchStageConfig {
    return {
      stage: "fetch",
      workers: 2,
      logFile: "fetch.log",
      logLevel: "debug",
      urlsSource,
      outputDir: path.join(dir, "out"),
      retryLimit: 2,
      chunkBytes: 1024,
      timeoutMs: 1000,
      backoffMs: 50,
      userAgent: "test-agent",
      ignoreHttpsErrors: false,
      ...overrides,
    };
  }

  beforeEach(async () => {
    dir = await makeTempDir("fetch-run");
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    await removeTempDir(dir);
  });

  it("summarizes completed, skipped and failed shards", async () => {
    await fs.promises.mkdir(path.join(dir, "out"));
    await fs.promises.writeFile(path.join(dir, "out", "old.gz"), "cached");
    const urlsFile = path.join(dir, "urls.txt");
    await fs.promises.writeFile(urlsFile, [`${ORIGIN}/old.gz`, `${ORIGIN}/new.gz`, `${ORIGIN}/gone.gz`].join("\n"));
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/new.gz", method: "GET" }).reply(200, "fresh");
    pool.intercept({ path: "/gone.gz", method: "GET" }).reply(404, "nope").times(2);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const metrics = new MetricsRegistry();

    const summary = await runFetcher({
      config: fetchConfig(urlsFile),
      logger: createTestLogger(),
      metrics,
      dispatcher: agent,
      sleep,
    });

    expect(summary).toEqual({ stage: "fetch", total: 3, completed: 1, skipped: 1, failed: 1 });
    expect(sleep.mock.calls).toEqual([[50]]);
    expect(metrics.getCounters()).toMatchObject({ fetch_completed: 1, fetch_skipped: 1, fetch_failed: 1 });
  });

  it("skips every shard that completed on an earlier run", async () => {
    const urlsFile = path.join(dir, "urls.txt");
    await fs.promises.writeFile(urlsFile, `${ORIGIN}/one.gz\n${ORIGIN}/two.gz\n`);
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: "/one.gz", method: "GET" }).reply(200, "first");
    pool.intercept({ path: "/two.gz", method: "GET" }).reply(200, "second");
    const run = () =>
      runFetcher({ config: fetchConfig(urlsFile), logger: createTestLogger(), metrics: new MetricsRegistry(), dispatcher: agent });

    const first = await run();
    const second = await run();

    expect(first).toEqual({ stage: "fetch", total: 2, completed: 2, skipped: 0, failed: 0 });
    expect(second).toEqual({ stage: "fetch", total: 2, completed: 0, skipped: 2, failed: 0 });
    expect(await fs.promises.readFile(path.join(dir, "out", "two.gz"), "utf-8")).toBe("second");
  });

  it("stops the run when there are no URLs", async () => {
    const urlsFile = path.join(dir, "urls.txt");
    await fs.promises.writeFile(urlsFile, "# nothing yet\n\n");

    await expect(
      runFetcher({ config: fetchConfig(urlsFile), logger: createTestLogger(), metrics: new MetricsRegistry(), dispatcher: agent }),
    ).rejects.toBeInstanceOf(FatalRunError);
  });
});
