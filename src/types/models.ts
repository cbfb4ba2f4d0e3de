export type StageName = "fetch" | "extract" | "scan";

/** A remote URL for fetch, or a local file path for extract and scan. */
export type WorkItem = string;

export type SkipReason = "already exists" | "already decompressed" | "unrecognized";

export interface CompletedOutcome {
  status: "completed";
  item: WorkItem;
  target: string;
  attempts: number;
}

export interface SkippedOutcome {
  status: "skipped";
  item: WorkItem;
  reason: SkipReason;
}

export interface FailedOutcome {
  status: "failed";
  item: WorkItem;
  error: string;
  attempts: number;
}

export type TransferOutcome = CompletedOutcome | SkippedOutcome | FailedOutcome;

export interface CorpusRecord {
  id: string;
  url: string;
  created: string;
  added: string;
  source: string;
  text: string;
}

export interface ScanResult {
  linesSeen: number;
  recordsKept: number;
}

export type ScanOutcome = (CompletedOutcome | FailedOutcome) & ScanResult;

export interface StageSummary {
  stage: StageName;
  total: number;
  completed: number;
  skipped: number;
  failed: number;
  linesSeen?: number;
  recordsKept?: number;
}
