import fs from "node:fs";
import path from "node:path";
import { once } from "node:events";
import { pipeline } from "node:stream/promises";
import { stringify, Stringifier } from "csv-stringify";
import { CsvEncoding } from "../config";
import { CorpusRecord } from "../types";
import { RecordSink } from "./types";

export const CSV_COLUMNS = ["id", "url", "created", "added", "source", "text"] as const;

/** Writes records as minimally quoted CSV rows, one at a time, into a single file. */
export class CsvRecordSink implements RecordSink {
  private readonly stringifier: Stringifier;
  private readonly finished: Promise<void>;
  private failure: unknown;
  private closed = false;

  constructor(filePath: string, encoding: CsvEncoding = "utf-8") {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.stringifier = stringify({ header: true, columns: [...CSV_COLUMNS] });
    this.stringifier.setEncoding("utf-8");
    const output = fs.createWriteStream(filePath, { encoding });
    this.finished = pipeline(this.stringifier, output).then(
      () => undefined,
      (error: unknown) => {
        this.failure = error;
      },
    );
  }

  async write(record: CorpusRecord): Promise<void> {
    this.throwIfFailed();
    if (this.closed) {
      throw new Error("CSV sink is closed");
    }
    if (!this.stringifier.write(record)) {
      await Promise.race([once(this.stringifier, "drain"), this.finished]);
      this.throwIfFailed();
    }
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.stringifier.end();
    }
    await this.finished;
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
  }
}
