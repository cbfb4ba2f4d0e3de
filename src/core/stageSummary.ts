import { FailedOutcome, StageName, StageSummary, TransferOutcome, WorkItem } from "../types";
import { errorMessage } from "./errors";

export function failedOutcome(item: WorkItem, error: unknown, attempts: number): FailedOutcome {
  return { status: "failed", item, error: errorMessage(error), attempts };
}

export function summarizeOutcomes(stage: StageName, outcomes: readonly Pick<TransferOutcome, "status">[]): StageSummary {
  const summary: StageSummary = { stage, total: outcomes.length, completed: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}
