import { Effect, Layer, ManagedRuntime } from "effect";
import type { AppConfigType } from "../config/index.js";
import { ConfigFromValue } from "../config/index.js";
import { TrackerStoreLive } from "../monitor/store.js";
import { StdoutReportSink } from "../report/reporter.js";
import { ManifestNameResolverLive } from "../steam/manifest.js";
import { loggingLayer } from "./logger.js";
import { formatMetricsSummary, readMetricsSummary } from "./metrics.js";

export function makeMonitorRuntime(config: AppConfigType, libraries: ReadonlyArray<string>) {
  return ManagedRuntime.make(
    Layer.mergeAll(
      ConfigFromValue(config),
      TrackerStoreLive,
      ManifestNameResolverLive(libraries),
      StdoutReportSink,
      loggingLayer(config.debug.enabled)
    )
  );
}

/** Debug-level one-line summary of the process counters */
export const logMetricsSummary: Effect.Effect<void> = readMetricsSummary.pipe(
  Effect.flatMap((summary) => Effect.logDebug(`counters: ${formatMetricsSummary(summary)}`))
);
