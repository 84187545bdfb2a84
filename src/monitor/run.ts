import { Effect } from "effect";
import { Config, reportConfig, tailConfig } from "../config/index.js";
import { NameResolver } from "../report/nameResolver.js";
import { ReportSink, runReporter } from "../report/reporter.js";
import { describeCause, LogOpenError, makeLogTailer } from "../tail/logTailer.js";
import type { LogSource } from "../tail/source.js";
import { TrackerStore } from "./store.js";

export interface MonitorOptions {
  readonly logPath: string;
  readonly source?: LogSource;
  readonly windowBytes?: number;
}

/**
 * Replay the log's recent window, then run the tailer and the reporter as
 * two fibers sharing the tracker store. Runs until interrupted; fails only
 * when the log cannot be opened, after reporting it once.
 */
export const runMonitor = (
  options: MonitorOptions
): Effect.Effect<never, LogOpenError, Config | TrackerStore | NameResolver | ReportSink> =>
  Effect.scoped(
    Effect.gen(function* () {
      const tail = yield* tailConfig;
      const report = yield* reportConfig;
      const tailer = yield* makeLogTailer({
        path: options.logPath,
        pollMs: tail.pollMs,
        retryMs: tail.retryMs,
        windowBytes: options.windowBytes,
        source: options.source,
      }).pipe(
        Effect.tapError((err) =>
          Effect.logError(`cannot open content log ${err.path}: ${describeCause(err.cause)}`)
        )
      );
      yield* Effect.logDebug(`tailing ${options.logPath} from offset ${tailer.position() ?? 0}`);
      yield* Effect.forkScoped(tailer.run);
      yield* Effect.forkScoped(runReporter(report.intervalMs, report.staleMs));
      return yield* Effect.never;
    })
  );
