/**
 * Environment variable parser using Effect Schema
 * Maps STEAMWATCH_* environment variables to typed configuration
 */

import { Option, Schema } from "effect"
import {
  AppConfig,
  type AppConfigType,
} from "./schema.js"
import {
  resolvePollMs,
  resolveReportIntervalMs,
  resolveStaleMs,
  resolveTimeoutMs,
} from "./intervals.js"

// ============================================================================
// Environment Variable Parsers
// ============================================================================

/** Parse a string to number, returning None if invalid */
const parseNumber = (value: string | undefined): Option.Option<number> => {
  if (value === undefined || value.trim() === "") return Option.none()
  const parsed = Number(value)
  return Number.isFinite(parsed) ? Option.some(parsed) : Option.none()
}

/** Parse a boolean from various string representations */
const parseBoolean = (value: string | undefined): Option.Option<boolean> => {
  if (value === undefined) return Option.none()
  const normalized = value.toLowerCase().trim()
  if (normalized === "1" || normalized === "true" || normalized === "on") {
    return Option.some(true)
  }
  if (normalized === "0" || normalized === "false" || normalized === "off") {
    return Option.some(false)
  }
  return Option.none()
}

/** Empty strings count as unset */
const parseString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

// ============================================================================
// Config Builders
// ============================================================================

const buildReportConfig = (env: NodeJS.ProcessEnv) => ({
  intervalMs: resolveReportIntervalMs(env),
  staleMs: resolveStaleMs(env),
})

const buildTailConfig = (env: NodeJS.ProcessEnv) => ({
  pollMs: resolvePollMs(env),
  retryMs: Option.getOrUndefined(
    parseNumber(env.STEAMWATCH_RETRY_MS).pipe(Option.filter((ms) => ms > 0))
  ),
})

const buildSteamConfig = (env: NodeJS.ProcessEnv) => ({
  root: parseString(env.STEAMWATCH_STEAM_ROOT),
  logPath: parseString(env.STEAMWATCH_LOG),
})

const buildDebugConfig = (env: NodeJS.ProcessEnv) => ({
  enabled: Option.getOrUndefined(parseBoolean(env.STEAMWATCH_DEBUG)),
})

// ============================================================================
// Main Decode Function
// ============================================================================

/** Raw config from environment (before schema validation) */
const buildRawConfig = (env: NodeJS.ProcessEnv) => ({
  report: buildReportConfig(env),
  tail: buildTailConfig(env),
  steam: buildSteamConfig(env),
  debug: buildDebugConfig(env),
  timeoutMs: resolveTimeoutMs(env),
})

/**
 * Synchronous config loading for use in non-Effect contexts
 * Throws on validation error
 */
export const loadConfigSync = (env: NodeJS.ProcessEnv = process.env): AppConfigType =>
  Schema.decodeUnknownSync(AppConfig)(buildRawConfig(env))

/**
 * Safe synchronous config loading with defaults
 * Never throws
 */
export const loadConfigSafe = (env: NodeJS.ProcessEnv = process.env): AppConfigType => {
  try {
    return loadConfigSync(env)
  } catch {
    // Return minimal valid config with all defaults
    return Schema.decodeUnknownSync(AppConfig)({})
  }
}
