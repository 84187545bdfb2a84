/**
 * Tracker types: classified content-log events and the derived download state
 */

/** Steam AppID as it appears in the log */
export type SubjectKey = string

/** Normalized status labels */
export type StatusLabel =
  | "Idle"
  | "Paused"
  | "Downloading"
  | "Staging"
  | "Committing"
  | "Verifying"
  | "Preparing"
  | "Allocating"
  | "Done"

/** Which log signal produced a throughput sample */
export type MetricSource = "rate" | "delta" | "stats"

export type ContentEvent =
  | {
      readonly kind: "update.changed"
      readonly subject: SubjectKey
      readonly rawStatus: string
      readonly logTs: string | undefined
    }
  | { readonly kind: "update.started"; readonly subject: SubjectKey; readonly logTs: string | undefined }
  | { readonly kind: "update.canceled"; readonly subject: SubjectKey; readonly logTs: string | undefined }
  | { readonly kind: "update.finished"; readonly subject: SubjectKey; readonly logTs: string | undefined }
  | {
      readonly kind: "state.changed"
      readonly subject: SubjectKey
      readonly rawStatus: string
      readonly logTs: string | undefined
    }
  | { readonly kind: "metric.rate"; readonly value: number; readonly logTs: string }
  | { readonly kind: "metric.delta"; readonly value: number; readonly logTs: string }
  | { readonly kind: "metric.stats"; readonly value: number; readonly logTs: string }

export type ContentEventKind = ContentEvent["kind"]

export type MetricEvent = Extract<ContentEvent, { kind: `metric.${string}` }>

export interface MetricSample {
  /** Throughput in Mbps */
  readonly value: number
  /** Timestamp embedded in the log line */
  readonly logTs: string
  readonly source: MetricSource
  /** Host wall clock (ms) when the event was applied */
  readonly receivedAt: number
}

export interface ActiveSubject {
  readonly subject: SubjectKey
  readonly status: StatusLabel
}

/**
 * When a subject was last touched. `order` is the event's position within
 * its batch, so lines applied in the same millisecond still rank in log order.
 */
export interface LastSeen {
  readonly at: number
  readonly order: number
}

export interface TrackerState {
  readonly statusBySubject: ReadonlyMap<SubjectKey, StatusLabel>
  readonly lastSeenBySubject: ReadonlyMap<SubjectKey, LastSeen>
  readonly metric: MetricSample | undefined
  readonly active: ActiveSubject | undefined
}
