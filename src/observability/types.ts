import { StageName } from "../types";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogFields {
  item?: string;
  file?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type TransferStage = Exclude<StageName, "scan">;

export type MetricCounterName =
  | `${TransferStage}_${"completed" | "skipped" | "failed"}`
  | "scan_completed"
  | "scan_failed"
  | "scan_lines_seen"
  | "scan_records_kept";

export type MetricTimerName = `${StageName}_ms`;
