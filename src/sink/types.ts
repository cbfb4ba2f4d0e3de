import { CorpusRecord } from "../types";

export interface RecordSink {
  /** Resolves once the record has been accepted, waiting for the output to drain if needed. */
  write(record: CorpusRecord): Promise<void>;
  close(): Promise<void>;
}
