#!/usr/bin/env node
import fs from "fs";
import process from "process";
import { Effect } from "effect";
import { applyCliArgs, helpText, parseCliArgs } from "./cli/args.js";
import { loadConfigSafe } from "./config/index.js";
import { runMonitor } from "./monitor/run.js";
import { logMetricsSummary, makeMonitorRuntime } from "./observability/runtime.js";
import { contentLogPath, findSteamRoot, listLibraryPaths } from "./steam/discovery.js";

type StopReason = "keypress" | "signal" | "timeout";

const STOP_KEYS = new Set(["q", "Q", "\r", "\n"]);

const args = parseCliArgs(process.argv.slice(2));

if (args.help) {
  process.stdout.write(helpText());
  process.exit(0);
}

const config = loadConfigSafe(applyCliArgs(args, process.env));

function waitForStop(): { stopped: Promise<StopReason>; release: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const cleanups: Array<() => void> = [];
  const stopped = new Promise<StopReason>((resolve) => {
    if (config.timeoutMs > 0) {
      timer = setTimeout(() => resolve("timeout"), config.timeoutMs);
    }
    const onSignal = () => resolve("signal");
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    cleanups.push(() => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    });
    if (process.stdin.isTTY) {
      const onData = (chunk: Buffer) => {
        const text = chunk.toString("utf8");
        // Raw mode swallows Ctrl+C
        if (text === "\u0003") resolve("signal");
        if ([...text].some((ch) => STOP_KEYS.has(ch))) resolve("keypress");
      };
      process.stdin.setRawMode(true);
      process.stdin.resume();
      process.stdin.on("data", onData);
      cleanups.push(() => {
        process.stdin.off("data", onData);
        process.stdin.setRawMode(false);
        process.stdin.pause();
      });
    }
  });
  return {
    stopped,
    release: () => {
      if (timer) clearTimeout(timer);
      for (const cleanup of cleanups) cleanup();
    },
  };
}

async function main(): Promise<number> {
  const steamRoot = config.steam.root ?? (await findSteamRoot());
  if (!steamRoot && !config.steam.logPath) {
    process.stdout.write("Steam installation not found.\n");
    return 1;
  }
  const logPath = config.steam.logPath ?? contentLogPath(steamRoot ?? "");
  if (!fs.existsSync(logPath)) {
    process.stdout.write(`Log file not found: ${logPath}\n`);
    return 1;
  }
  const libraries = steamRoot ? await listLibraryPaths(steamRoot) : [];

  process.stdout.write(`Monitoring: ${logPath}\n`);
  process.stdout.write(`Report interval: ${config.report.intervalMs / 1000} s\n`);
  process.stdout.write("Press 'q' or Enter to stop.\n");

  const runtime = makeMonitorRuntime(config, libraries);
  const stop = waitForStop();
  const program = runMonitor({ logPath }).pipe(
    Effect.raceFirst(Effect.promise(() => stop.stopped)),
    Effect.tap((reason) => Effect.logDebug(`stopping: ${reason}`)),
    Effect.as(0),
    Effect.catchTag("LogOpenError", () => Effect.succeed(1)),
    Effect.tap(() => logMetricsSummary)
  );

  try {
    return await runtime.runPromise(program);
  } finally {
    stop.release();
    await runtime.dispose();
    process.stdout.write("Stopped.\n");
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    process.stderr.write(`[steamwatch] cli error: ${String(err)}\n`);
    process.exit(1);
  });
