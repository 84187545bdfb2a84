/**
 * Config service for dependency injection using Effect Context
 */

import { Context, Effect, Layer } from "effect"
import type { AppConfigType } from "./schema.js"

/**
 * Tag for the Config service
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   yield* Effect.log(`Reporting every ${config.report.intervalMs} ms`)
 * })
 * ```
 */
export class Config extends Context.Tag("Config")<Config, AppConfigType>() {}

/**
 * Layer with explicit config value (useful for testing)
 */
export const ConfigFromValue = (value: AppConfigType) =>
  Layer.succeed(Config, value)

/**
 * Access a specific portion of the config
 */
export const accessWith = <A>(f: (config: AppConfigType) => A): Effect.Effect<A, never, Config> =>
  Config.pipe(Effect.map(f))

export const reportConfig = accessWith(c => c.report)
export const tailConfig = accessWith(c => c.tail)
