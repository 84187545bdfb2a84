import { Data, Duration, Effect, type Scope } from "effect";
import { ingestLines, type TrackerStore } from "../monitor/store.js";
import { recordReopen, recordTransientError } from "../observability/metrics.js";
import { nodeLogSource, readCompleteLines, type LogHandle, type LogSource } from "./source.js";

/** Bytes of backlog replayed whenever the log is (re)opened */
export const BACKLOG_WINDOW_BYTES = 200_000;
const MAX_READ_BYTES = 2 * 1024 * 1024;

export class LogOpenError extends Data.TaggedError("LogOpenError")<{
  readonly path: string;
  readonly cause: unknown;
}> {}

export class LogReadError extends Data.TaggedError("LogReadError")<{
  readonly path: string;
  readonly operation: "stat" | "read" | "reopen";
  readonly cause: unknown;
}> {}

export interface TailerOptions {
  readonly path: string;
  readonly pollMs: number;
  readonly retryMs: number;
  readonly windowBytes?: number;
  readonly source?: LogSource;
}

export type PollOutcome = "advanced" | "idle" | "reopened";

export interface LogTailer {
  /** Open-or-reopen: bounded backlog replay, then position at the end */
  readonly open: Effect.Effect<void, LogOpenError, TrackerStore>;
  /** One tailing step */
  readonly poll: Effect.Effect<PollOutcome, LogReadError, TrackerStore>;
  /** Poll forever; transient failures are retried after `retryMs` */
  readonly run: Effect.Effect<never, never, TrackerStore>;
  readonly close: Effect.Effect<void>;
  readonly position: () => number | undefined;
}

interface LogCursor {
  readonly handle: LogHandle;
  readonly ino: number;
  pos: number;
  /** False while the window start fell mid-line and no newline has been seen yet */
  aligned: boolean;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function createLogTailer(options: TailerOptions): LogTailer {
  const source = options.source ?? nodeLogSource;
  const windowBytes = options.windowBytes ?? BACKLOG_WINDOW_BYTES;
  const { path } = options;
  let cursor: LogCursor | undefined;

  const close = Effect.suspend(() => {
    const current = cursor;
    cursor = undefined;
    if (!current) return Effect.void;
    return Effect.tryPromise({
      try: () => current.handle.close(),
      catch: (cause) => cause,
    }).pipe(
      Effect.catchAll((cause) =>
        Effect.logDebug(`close failed for ${path}: ${describeCause(cause)}`)
      )
    );
  });

  const openCursor = Effect.tryPromise({
    try: async () => {
      const handle = await source.open(path);
      try {
        const stat = await handle.stat();
        const start = Math.max(0, stat.size - windowBytes);
        const batch = await readCompleteLines(handle, start, stat.size);
        return { handle, stat, start, batch };
      } catch (err) {
        await handle.close().catch(() => undefined);
        throw err;
      }
    },
    catch: (cause) => new LogOpenError({ path, cause }),
  });

  const open: LogTailer["open"] = Effect.gen(function* () {
    yield* close;
    const { handle, stat, start, batch } = yield* openCursor;
    const midLine = start > 0;
    // Starting mid-file: the first line read is only a fragment
    const lines = midLine ? batch.lines.slice(1) : batch.lines;
    cursor = {
      handle,
      ino: stat.ino,
      pos: batch.end,
      aligned: !midLine || batch.lines.length > 0,
    };
    yield* ingestLines(lines);
    yield* Effect.logDebug(
      `replayed ${lines.length} lines of ${path} from offset ${start}; positioned at ${batch.end}`
    );
  });

  const reopen = (reason: "rotated" | "replaced" | "retry") =>
    open.pipe(
      Effect.tap(() => recordReopen(reason)),
      Effect.mapError(
        (err) => new LogReadError({ path, operation: "reopen", cause: err.cause })
      )
    );

  const poll: LogTailer["poll"] = Effect.gen(function* () {
    const current = cursor;
    if (!current) {
      yield* reopen("retry");
      return "reopened" as const;
    }
    const stat = yield* Effect.tryPromise({
      try: () => source.stat(path),
      catch: (cause) => new LogReadError({ path, operation: "stat", cause }),
    });
    if (stat.size < current.pos) {
      yield* Effect.logDebug(`${path} shrank to ${stat.size} bytes (offset ${current.pos}); reopening`);
      yield* reopen("rotated");
      return "reopened" as const;
    }
    if (stat.ino !== 0 && current.ino !== 0 && stat.ino !== current.ino) {
      yield* Effect.logDebug(`${path} was replaced; reopening`);
      yield* reopen("replaced");
      return "reopened" as const;
    }
    if (stat.size === current.pos) return "idle" as const;

    const limit = Math.min(stat.size, current.pos + MAX_READ_BYTES);
    const batch = yield* Effect.tryPromise({
      try: () => readCompleteLines(current.handle, current.pos, limit),
      catch: (cause) => new LogReadError({ path, operation: "read", cause }),
    });
    if (batch.end === current.pos) return "idle" as const;
    let lines = batch.lines;
    if (!current.aligned) {
      lines = lines.slice(1);
      current.aligned = true;
    }
    current.pos = batch.end;
    yield* ingestLines(lines);
    return "advanced" as const;
  });

  const step = poll.pipe(
    Effect.catchTag("LogReadError", (err) =>
      Effect.logDebug(`${err.operation} failed for ${err.path}: ${describeCause(err.cause)}`).pipe(
        Effect.zipRight(recordTransientError(err.operation)),
        Effect.as("failed" as const)
      )
    ),
    Effect.flatMap((outcome) => {
      if (outcome === "advanced" || outcome === "reopened") return Effect.void;
      const waitMs = outcome === "failed" ? options.retryMs : options.pollMs;
      return Effect.sleep(Duration.millis(waitMs));
    })
  );

  return {
    open,
    poll,
    run: Effect.forever(step),
    close,
    position: () => cursor?.pos,
  };
}

/**
 * Open the log and replay its recent window; the handle is released when
 * the enclosing scope closes.
 */
export const makeLogTailer = (
  options: TailerOptions
): Effect.Effect<LogTailer, LogOpenError, TrackerStore | Scope.Scope> =>
  Effect.acquireRelease(
    Effect.gen(function* () {
      const tailer = createLogTailer(options);
      yield* tailer.open;
      return tailer;
    }),
    (tailer) => tailer.close
  );
