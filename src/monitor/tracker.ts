/**
 * State updater: folds classified content-log events into TrackerState.
 *
 * Every function here is pure and returns a new state, so a whole batch of
 * events can be committed through a single Ref.update.
 */

import type {
  ActiveSubject,
  ContentEvent,
  LastSeen,
  MetricEvent,
  MetricSource,
  StatusLabel,
  SubjectKey,
  TrackerState,
} from "./types.js"
import { hasActiveKeyword, isNoneStatus, isSuspendedStatus, normalizeStatus } from "./status.js"

export const emptyTrackerState = (): TrackerState => ({
  statusBySubject: new Map(),
  lastSeenBySubject: new Map(),
  metric: undefined,
  active: undefined,
})

const METRIC_SOURCES: Record<MetricEvent["kind"], MetricSource> = {
  "metric.rate": "rate",
  "metric.delta": "delta",
  "metric.stats": "stats",
}

/** Record a status for a subject and keep a cached active status in lockstep */
const touchSubject = (
  state: TrackerState,
  subject: SubjectKey,
  status: StatusLabel,
  seen: LastSeen,
  active: ActiveSubject | undefined = state.active
): TrackerState => {
  const statusBySubject = new Map(state.statusBySubject)
  statusBySubject.set(subject, status)
  const lastSeenBySubject = new Map(state.lastSeenBySubject)
  lastSeenBySubject.set(subject, seen)
  return {
    ...state,
    statusBySubject,
    lastSeenBySubject,
    active: active?.subject === subject ? { subject, status } : active,
  }
}

/** `order` ranks events that share the same `now`; later lines pass a higher value */
export function applyEvent(
  state: TrackerState,
  event: ContentEvent,
  now: number,
  order = 0
): TrackerState {
  const seen: LastSeen = { at: now, order }
  switch (event.kind) {
    case "update.changed": {
      let status = normalizeStatus(event.rawStatus)
      const active = hasActiveKeyword(event.rawStatus)
        ? { subject: event.subject, status }
        : state.active
      if (isNoneStatus(event.rawStatus)) status = "Idle"
      return touchSubject(state, event.subject, status, seen, active)
    }

    case "update.started":
      return touchSubject(state, event.subject, "Downloading", seen, {
        subject: event.subject,
        status: "Downloading",
      })

    case "update.canceled":
      return touchSubject(state, event.subject, "Paused", seen)

    case "update.finished": {
      const next = touchSubject(state, event.subject, "Done", seen)
      if (state.active?.subject !== event.subject) return next
      // A finished download's speed must not leak into the next report
      return { ...next, active: undefined, metric: undefined }
    }

    case "state.changed":
      if (!isSuspendedStatus(event.rawStatus)) return state
      return touchSubject(state, event.subject, "Paused", seen)

    case "metric.rate":
    case "metric.delta":
    case "metric.stats":
      return {
        ...state,
        metric: {
          value: event.value,
          logTs: event.logTs,
          source: METRIC_SOURCES[event.kind],
          receivedAt: now,
        },
      }
  }
}

export function applyEvents(
  state: TrackerState,
  events: ReadonlyArray<ContentEvent>,
  now: number
): TrackerState {
  return events.reduce((acc, event, index) => applyEvent(acc, event, now, index), state)
}
