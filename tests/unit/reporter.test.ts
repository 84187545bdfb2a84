import test from "node:test";
import assert from "node:assert/strict";
import { Clock, Effect, Layer } from "effect";
import { ingestLines, makeTrackerStore, TrackerStore } from "../../src/monitor/store.ts";
import { applyEvents, emptyTrackerState } from "../../src/monitor/tracker.ts";
import type { TrackerState } from "../../src/monitor/types.ts";
import { DEFAULT_STALE_MS } from "../../src/config/intervals.ts";
import { describeSubject, formatReportLine, isMetricFresh } from "../../src/report/format.ts";
import { NameResolverFromMap } from "../../src/report/nameResolver.ts";
import { buildReport, reportOnce, ReportSink } from "../../src/report/reporter.ts";

const STALE_MS = DEFAULT_STALE_MS;
const names = NameResolverFromMap({ "10": "Game X" });

const downloading = (receivedAt: number): TrackerState =>
  applyEvents(
    emptyTrackerState(),
    [
      { kind: "update.started", subject: "10", logTs: "2024-01-01 10:00:00" },
      { kind: "metric.rate", value: 12.5, logTs: "2024-01-01 10:00:01" },
    ],
    receivedAt
  );

const report = (state: TrackerState, now: number) =>
  Effect.runPromise(buildReport(state, now, STALE_MS).pipe(Effect.provide(names)));

test("reports name, status and a fresh speed", async () => {
  const result = await report(downloading(1000), 1000 + STALE_MS);
  assert.deepEqual(result, {
    message: "Game X | Downloading | speed: 12.500 Mbps",
    outcome: "fresh",
  });
});

test("a sample older than the stale window shows an unknown speed", async () => {
  const result = await report(downloading(1000), 1000 + STALE_MS + 1);
  assert.deepEqual(result, { message: "Game X | Downloading | speed: ?", outcome: "stale" });
});

test("paused subjects are reported without a speed", async () => {
  const state = applyEvents(
    downloading(1000),
    [{ kind: "update.canceled", subject: "10", logTs: "2024-01-01 10:00:02" }],
    1000
  );
  const result = await report(state, 1000);
  assert.deepEqual(result, { message: "Game X | Paused", outcome: "paused" });
});

test("nothing is reported for an empty state or an unnamed subject", async () => {
  assert.deepEqual(await report(emptyTrackerState(), 0), {
    message: "nothing active",
    outcome: "nothing",
  });
  const unnamed = applyEvents(
    emptyTrackerState(),
    [{ kind: "update.started", subject: "99", logTs: "2024-01-01 10:00:00" }],
    0
  );
  assert.deepEqual(await report(unnamed, 0), { message: "nothing active", outcome: "nothing" });
});

test("describeSubject renders an unknown status", () => {
  assert.equal(describeSubject("Game X", "unknown", undefined, 0), "Game X | unknown | speed: ?");
});

test("isMetricFresh defaults to the configured stale window", () => {
  const sample = { value: 1, logTs: "2024-01-01 10:00:00", source: "rate" as const, receivedAt: 0 };
  assert.equal(isMetricFresh(sample, DEFAULT_STALE_MS), true);
  assert.equal(isMetricFresh(sample, DEFAULT_STALE_MS + 1), false);
});

test("formatReportLine prefixes local wall-clock time", () => {
  assert.equal(
    formatReportLine(new Date(2024, 0, 1, 10, 0, 2), "nothing active"),
    "[2024-01-01 10:00:02] nothing active"
  );
});

function collectingSink(lines: string[]) {
  return Layer.succeed(
    ReportSink,
    ReportSink.of({
      write: (line) =>
        Effect.sync(() => {
          lines.push(line);
        }),
    })
  );
}

test("reportOnce writes one stamped line to the sink", async () => {
  const lines: string[] = [];
  const layer = Layer.mergeAll(
    Layer.effect(TrackerStore, makeTrackerStore(downloading(0))),
    names,
    collectingSink(lines)
  );
  const returned = await Effect.runPromise(reportOnce(STALE_MS).pipe(Effect.provide(layer)));
  assert.deepEqual(lines, [returned]);
  assert.match(
    returned,
    /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Game X \| Downloading \| speed: \?$/
  );
});

test("a finished download stops being reported", async () => {
  const layer = Layer.mergeAll(Layer.effect(TrackerStore, makeTrackerStore()), names);
  const messages = await Effect.runPromise(
    Effect.gen(function* () {
      const store = yield* TrackerStore;
      const current = Effect.gen(function* () {
        const state = yield* store.snapshot;
        const now = yield* Clock.currentTimeMillis;
        return (yield* buildReport(state, now, STALE_MS)).message;
      });

      yield* ingestLines([
        "[2024-01-01 10:00:00] AppID 10 update started : download 0/10",
        "[2024-01-01 10:00:01] Current download rate: 12.5 Mbps",
      ]);
      const during = yield* current;
      yield* ingestLines(["[2024-01-01 10:05:00] AppID 10 finished update (took 299 seconds)"]);
      const after = yield* current;
      return [during, after];
    }).pipe(Effect.provide(layer))
  );
  assert.deepEqual(messages, ["Game X | Downloading | speed: 12.500 Mbps", "nothing active"]);
});
