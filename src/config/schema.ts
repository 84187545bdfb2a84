/**
 * Configuration schema definitions using Effect Schema
 * This module provides type-safe, validated configuration with defaults
 */

import { Schema } from "effect"
import {
  DEFAULT_POLL_MS,
  DEFAULT_REPORT_INTERVAL_MS,
  DEFAULT_RETRY_MS,
  DEFAULT_STALE_MS,
  DEFAULT_TIMEOUT_MS,
} from "./intervals.js"

// ============================================================================
// Primitive Config Types
// ============================================================================

/** Positive number schema */
const PositiveNumber = Schema.Number.pipe(
  Schema.positive(),
  Schema.annotations({ description: "Must be a positive number" })
)

/** Zero or more milliseconds */
const NonNegativeMs = Schema.Number.pipe(
  Schema.nonNegative(),
  Schema.annotations({ description: "Milliseconds, 0 or more" })
)

// ============================================================================
// Section Configs
// ============================================================================

/** Status report cadence and metric staleness */
export const ReportConfig = Schema.Struct({
  /** Interval between status lines (ms) */
  intervalMs: PositiveNumber.pipe(
    Schema.optionalWith({ default: () => DEFAULT_REPORT_INTERVAL_MS })
  ),

  /** Age after which a throughput sample is shown as unknown (ms) */
  staleMs: PositiveNumber.pipe(
    Schema.optionalWith({ default: () => DEFAULT_STALE_MS })
  ),
})

/** Log tailing cadence */
export const TailConfig = Schema.Struct({
  /** Sleep when no new bytes are available (ms) */
  pollMs: PositiveNumber.pipe(
    Schema.optionalWith({ default: () => DEFAULT_POLL_MS })
  ),

  /** Backoff after a failed stat/read (ms) */
  retryMs: PositiveNumber.pipe(
    Schema.optionalWith({ default: () => DEFAULT_RETRY_MS })
  ),
})

/** Steam installation overrides */
export const SteamConfig = Schema.Struct({
  root: Schema.String.pipe(Schema.optional),
  logPath: Schema.String.pipe(Schema.optional),
})

/** Debug flags configuration */
export const DebugConfig = Schema.Struct({
  enabled: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),
})

/** Complete application configuration */
export const AppConfig = Schema.Struct({
  report: ReportConfig.pipe(
    Schema.optionalWith({
      default: () => ({ intervalMs: DEFAULT_REPORT_INTERVAL_MS, staleMs: DEFAULT_STALE_MS }),
    })
  ),
  tail: TailConfig.pipe(
    Schema.optionalWith({ default: () => ({ pollMs: DEFAULT_POLL_MS, retryMs: DEFAULT_RETRY_MS }) })
  ),
  steam: SteamConfig.pipe(
    Schema.optionalWith({ default: () => ({}) })
  ),
  debug: DebugConfig.pipe(
    Schema.optionalWith({ default: () => ({ enabled: false }) })
  ),

  /** Stop monitoring after this long; 0 runs until interrupted (ms) */
  timeoutMs: NonNegativeMs.pipe(
    Schema.optionalWith({ default: () => DEFAULT_TIMEOUT_MS })
  ),
})

// ============================================================================
// Type Exports
// ============================================================================

export type AppConfigType = typeof AppConfig.Type
export type ReportConfigType = typeof ReportConfig.Type
export type TailConfigType = typeof TailConfig.Type
export type SteamConfigType = typeof SteamConfig.Type
export type DebugConfigType = typeof DebugConfig.Type
