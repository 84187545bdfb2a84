import { Clock, Context, Effect, Layer, Ref } from "effect";
import type { ContentEvent, TrackerState } from "./types.js";
import { applyEvents, emptyTrackerState } from "./tracker.js";
import { classifyLine } from "./classify.js";
import { recordEventsApplied, recordLinesRead } from "../observability/metrics.js";

/**
 * Sole owner of TrackerState. The tailer fiber writes through `apply`, the
 * reporter fiber reads through `snapshot`; each batch commits in one
 * Ref.update so a reader never sees a partially applied event.
 */
export class TrackerStore extends Context.Tag("TrackerStore")<
  TrackerStore,
  {
    readonly apply: (events: ReadonlyArray<ContentEvent>, receivedAt: number) => Effect.Effect<void>;
    readonly snapshot: Effect.Effect<TrackerState>;
  }
>() {}

export const makeTrackerStore = (initial: TrackerState = emptyTrackerState()) =>
  Effect.gen(function* () {
    const stateRef = yield* Ref.make(initial);
    return TrackerStore.of({
      apply: (events, receivedAt) =>
        events.length === 0
          ? Effect.void
          : Ref.update(stateRef, (state) => applyEvents(state, events, receivedAt)),
      snapshot: Ref.get(stateRef),
    });
  });

export const TrackerStoreLive = Layer.effect(TrackerStore, makeTrackerStore());

/** Classify raw lines and commit the resulting events as one batch */
export const ingestLines = (
  lines: ReadonlyArray<string>
): Effect.Effect<number, never, TrackerStore> =>
  Effect.gen(function* () {
    const events: ContentEvent[] = [];
    for (const line of lines) {
      const event = classifyLine(line.trim());
      if (event) events.push(event);
    }
    yield* recordLinesRead(lines.length);
    if (events.length === 0) return 0;
    const store = yield* TrackerStore;
    const receivedAt = yield* Clock.currentTimeMillis;
    yield* store.apply(events, receivedAt);
    yield* recordEventsApplied(events.map((event) => event.kind));
    return events.length;
  });
