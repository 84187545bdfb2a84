import { Effect, Metric } from "effect";
import type { ContentEventKind } from "../monitor/types.js";

const linesReadTotal = Metric.counter("log_lines_read_total", {
  description: "Complete content-log lines read",
  incremental: true,
});
const eventsAppliedTotal = Metric.counter("events_applied_total", {
  description: "Classified events applied to tracker state",
  incremental: true,
});
const logReopensTotal = Metric.counter("log_reopens_total", {
  description: "Content-log reopen and replay cycles",
  incremental: true,
});
const transientErrorsTotal = Metric.counter("transient_errors_total", {
  description: "Retried stat/read failures",
  incremental: true,
});
const reportsTotal = Metric.counter("reports_total", {
  description: "Status lines emitted",
  incremental: true,
});

export type ReportOutcome = "nothing" | "paused" | "stale" | "fresh";

export interface MetricsSummary {
  readonly linesRead: number;
  readonly eventsApplied: number;
  readonly reopens: number;
  readonly transientErrors: number;
  readonly reports: number;
}

export function recordLinesRead(lines: number): Effect.Effect<void> {
  if (lines <= 0) return Effect.void;
  return Metric.incrementBy(linesReadTotal, lines);
}

export function recordEventsApplied(
  kinds: ReadonlyArray<ContentEventKind>
): Effect.Effect<void> {
  return Effect.forEach(
    kinds,
    (kind) => Metric.increment(Metric.tagged(eventsAppliedTotal, "kind", kind)),
    { discard: true }
  );
}

export function recordReopen(reason: "rotated" | "replaced" | "retry"): Effect.Effect<void> {
  return Metric.increment(Metric.tagged(logReopensTotal, "reason", reason));
}

export function recordTransientError(operation: string): Effect.Effect<void> {
  return Metric.increment(Metric.tagged(transientErrorsTotal, "operation", operation));
}

export function recordReport(outcome: ReportOutcome): Effect.Effect<void> {
  return Metric.increment(Metric.tagged(reportsTotal, "outcome", outcome));
}

export const readMetricsSummary: Effect.Effect<MetricsSummary> = Effect.gen(function* () {
  const snapshot = yield* Metric.snapshot;
  const totals = new Map<string, number>();
  for (const pair of snapshot) {
    const state = pair.metricState;
    if (!("count" in state) || typeof state.count !== "number") continue;
    const name = pair.metricKey.name;
    totals.set(name, (totals.get(name) ?? 0) + state.count);
  }
  return {
    linesRead: totals.get("log_lines_read_total") ?? 0,
    eventsApplied: totals.get("events_applied_total") ?? 0,
    reopens: totals.get("log_reopens_total") ?? 0,
    transientErrors: totals.get("transient_errors_total") ?? 0,
    reports: totals.get("reports_total") ?? 0,
  };
});

export function formatMetricsSummary(summary: MetricsSummary): string {
  return [
    `lines=${summary.linesRead}`,
    `events=${summary.eventsApplied}`,
    `reopens=${summary.reopens}`,
    `transient_errors=${summary.transientErrors}`,
    `reports=${summary.reports}`,
  ].join(" ");
}
