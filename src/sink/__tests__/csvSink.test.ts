import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CorpusRecord } from "../../types";
import { makeTempDir, removeTempDir } from "../../__tests__/helpers";
import { CsvRecordSink } from "../csvSink";

function record(overrides: Partial<CorpusRecord>): CorpusRecord {
  return { id: "1", url: "https://example.com/blog/a", created: "", added: "", source: "", text: "body", ...overrides };
}

describe("CsvRecordSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("csv");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("writes a header and quotes only fields that need it", async () => {
    const filePath = path.join(dir, "nested", "out.csv");
    const sink = new CsvRecordSink(filePath);

    await sink.write(record({ id: "1", text: "plain" }));
    await sink.write(record({ id: "2", text: "comma, here" }));
    await sink.write(record({ id: "3", text: 'a "quoted" word' }));
    await sink.write(record({ id: "4", text: "two\nlines" }));
    await sink.close();

    expect(await fs.promises.readFile(filePath, "utf-8")).toBe(
      [
        "id,url,created,added,source,text",
        "1,https://example.com/blog/a,,,,plain",
        '2,https://example.com/blog/a,,,,"comma, here"',
        '3,https://example.com/blog/a,,,,"a ""quoted"" word"',
        '4,https://example.com/blog/a,,,,"two',
        'lines"',
        "",
      ].join("\n"),
    );
  });

  it("encodes the file with the configured encoding", async () => {
    const filePath = path.join(dir, "latin1.csv");
    const sink = new CsvRecordSink(filePath, "latin1");

    await sink.write(record({ text: "café" }));
    await sink.close();

    const bytes = await fs.promises.readFile(filePath);
    expect(bytes.includes(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe(true);
    expect(bytes.toString("latin1")).toBe("id,url,created,added,source,text\n1,https://example.com/blog/a,,,,café\n");
  });

  it("rejects writes after close", async () => {
    const sink = new CsvRecordSink(path.join(dir, "closed.csv"));
    await sink.write(record({}));
    await sink.close();

    await expect(sink.write(record({}))).rejects.toThrow("CSV sink is closed");
  });
});
