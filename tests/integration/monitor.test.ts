import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Effect, Either, Layer, Logger, LogLevel } from "effect";
import { ConfigFromValue, loadConfigSafe } from "../../src/config/index.ts";
import { runMonitor } from "../../src/monitor/run.ts";
import { TrackerStoreLive } from "../../src/monitor/store.ts";
import { NameResolverFromMap } from "../../src/report/nameResolver.ts";
import { ReportSink } from "../../src/report/reporter.ts";
import { MemoryLogFile } from "../helpers/memoryLogSource.ts";

function monitorLayer(lines: string[]) {
  return Layer.mergeAll(
    ConfigFromValue(loadConfigSafe({ STEAMWATCH_INTERVAL_SEC: "0.1", STEAMWATCH_POLL_MS: "10" })),
    TrackerStoreLive,
    NameResolverFromMap({ "10": "Game X" }),
    Layer.succeed(
      ReportSink,
      ReportSink.of({
        write: (line) =>
          Effect.sync(() => {
            lines.push(line);
          }),
      })
    ),
    Logger.minimumLogLevel(LogLevel.None)
  );
}

test("replays the log and reports the running download on a fixed cadence", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "steamwatch-"));
  const logPath = path.join(dir, "content_log.txt");
  await fs.writeFile(
    logPath,
    "[2024-01-01 10:00:00] AppID 10 update started : download 0/100\n" +
      "[2024-01-01 10:00:01] Current download rate: 12.5 Mbps\n"
  );

  const lines: string[] = [];
  await Effect.runPromise(
    runMonitor({ logPath }).pipe(
      Effect.raceFirst(Effect.sleep("250 millis")),
      Effect.provide(monitorLayer(lines))
    )
  );

  assert.ok(lines.length >= 2, `expected at least two reports, got ${lines.length}`);
  assert.match(
    lines[0],
    /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Game X \| Downloading \| speed: 12\.500 Mbps$/
  );
});

test("a missing log fails the monitor with LogOpenError", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "steamwatch-"));
  const logPath = path.join(dir, "missing.txt");
  const lines: string[] = [];
  const result = await Effect.runPromise(
    Effect.either(runMonitor({ logPath })).pipe(Effect.provide(monitorLayer(lines)))
  );
  assert.ok(Either.isLeft(result));
  if (Either.isLeft(result)) {
    assert.equal(result.left._tag, "LogOpenError");
    assert.equal(result.left.path, logPath);
  }
  assert.deepEqual(lines, []);
});

test("interrupting the monitor stops both loops and closes the log", async () => {
  const file = new MemoryLogFile(
    "[2024-01-01 10:00:00] AppID 10 update started : download 0/100\n"
  );
  const lines: string[] = [];
  await Effect.runPromise(
    runMonitor({ logPath: "/steam/logs/content_log.txt", source: file }).pipe(
      Effect.raceFirst(Effect.sleep("120 millis")),
      Effect.provide(monitorLayer(lines))
    )
  );
  assert.equal(file.opens, 1);
  assert.equal(file.closes, 1);
  assert.ok(file.stats > 0);

  const reads = file.reads.length;
  const stats = file.stats;
  const reports = lines.length;
  await new Promise((resolve) => setTimeout(resolve, 100));
  file.append("[2024-01-01 10:00:05] AppID 20 update started : go\n");
  await new Promise((resolve) => setTimeout(resolve, 100));
  assert.equal(file.reads.length, reads);
  assert.equal(file.stats, stats);
  assert.equal(lines.length, reports);
});
