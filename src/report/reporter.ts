import { Clock, Context, Duration, Effect, Layer, Option, Schedule } from "effect";
import type { TrackerState } from "../monitor/types.js";
import { TrackerStore } from "../monitor/store.js";
import { effectiveStatus, resolveActiveSubject } from "../monitor/activeSubject.js";
import { recordReport, type ReportOutcome } from "../observability/metrics.js";
import { NameResolver } from "./nameResolver.js";
import { describeSubject, formatReportLine, isMetricFresh, NOTHING_ACTIVE } from "./format.js";

/** Text sink receiving one rendered line per tick */
export class ReportSink extends Context.Tag("ReportSink")<
  ReportSink,
  { readonly write: (line: string) => Effect.Effect<void> }
>() {}

export const StdoutReportSink = Layer.succeed(
  ReportSink,
  ReportSink.of({
    write: (line) =>
      Effect.sync(() => {
        process.stdout.write(`${line}\n`);
      }),
  })
);

export interface Report {
  readonly message: string;
  readonly outcome: ReportOutcome;
}

export const buildReport = (
  state: TrackerState,
  now: number,
  staleMs: number
): Effect.Effect<Report, never, NameResolver> =>
  Effect.gen(function* () {
    const subject = resolveActiveSubject(state);
    if (subject === undefined) return { message: NOTHING_ACTIVE, outcome: "nothing" as const };

    const resolver = yield* NameResolver;
    const name = yield* resolver.resolve(subject);
    // Subjects without a display name are not reportable
    if (Option.isNone(name)) return { message: NOTHING_ACTIVE, outcome: "nothing" as const };

    const status = effectiveStatus(state, subject);
    const message = describeSubject(name.value, status, state.metric, now, staleMs);
    const outcome: ReportOutcome =
      status === "Paused" ? "paused" : isMetricFresh(state.metric, now, staleMs) ? "fresh" : "stale";
    return { message, outcome };
  });

/** Render and emit one status line */
export const reportOnce = (
  staleMs: number
): Effect.Effect<string, never, TrackerStore | NameResolver | ReportSink> =>
  Effect.gen(function* () {
    const store = yield* TrackerStore;
    const state = yield* store.snapshot;
    const now = yield* Clock.currentTimeMillis;
    const report = yield* buildReport(state, now, staleMs);
    const line = formatReportLine(new Date(now), report.message);
    const sink = yield* ReportSink;
    yield* sink.write(line);
    yield* recordReport(report.outcome);
    return line;
  });

/** Report immediately, then every `intervalMs` */
export const runReporter = (
  intervalMs: number,
  staleMs: number
): Effect.Effect<void, never, TrackerStore | NameResolver | ReportSink> =>
  reportOnce(staleMs).pipe(
    Effect.repeat(Schedule.spaced(Duration.millis(intervalMs))),
    Effect.asVoid
  );
