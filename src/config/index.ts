/**
 * Configuration module using Effect Schema
 *
 * Provides type-safe, validated configuration with defaults.
 * STEAMWATCH_* environment variables are mapped to structured config objects.
 */

// Schema definitions and types
export {
  AppConfig,
  ReportConfig,
  TailConfig,
  SteamConfig,
  DebugConfig,
  type AppConfigType,
  type ReportConfigType,
  type TailConfigType,
  type SteamConfigType,
  type DebugConfigType,
} from "./schema.js"

// Environment parsing
export {
  loadConfigSync,
  loadConfigSafe,
} from "./fromEnv.js"

// Service and layers
export {
  Config,
  ConfigFromValue,
  accessWith,
  reportConfig,
  tailConfig,
} from "./service.js"
