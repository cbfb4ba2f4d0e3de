import { TransferOutcome } from "../types";
import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName, TransferStage } from "./types";

export interface DurationSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

function summarizeDurations(values: readonly number[]): DurationSummary {
  let total = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = 0;
  for (const value of values) {
    total += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { count: values.length, min, max, avg: Math.round((total / values.length) * 100) / 100 };
}

/** Per-command counters and stage timings. Only names that were touched appear in a snapshot. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly durations = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordOutcome(stage: TransferStage, outcome: Pick<TransferOutcome, "status">): void {
    this.incrementCounter(`${stage}_${outcome.status}`);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.durations.get(name) ?? [];
      values.push(durationMs);
      this.durations.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Partial<Record<MetricCounterName, number>> {
    const counters: Partial<Record<MetricCounterName, number>> = {};
    for (const [name, value] of this.counters) {
      counters[name] = value;
    }
    return counters;
  }

  getTimerSummaries(): Partial<Record<MetricTimerName, DurationSummary>> {
    const timers: Partial<Record<MetricTimerName, DurationSummary>> = {};
    for (const [name, values] of this.durations) {
      timers[name] = summarizeDurations(values);
    }
    return timers;
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", { counters: this.getCounters(), timers: this.getTimerSummaries() });
  }
}
