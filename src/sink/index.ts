import { ScanStageConfig } from "../config";
import { CsvRecordSink } from "./csvSink";
import { RecordSink } from "./types";

export function createSink(config: ScanStageConfig): RecordSink {
  return new CsvRecordSink(config.outputCsv, config.encoding);
}

export * from "./csvSink";
export * from "./types";
