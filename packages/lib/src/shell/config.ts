import { Effect, Either } from "effect"

import { type ConfigEnv, resolveBoxConfig } from "../core/config.js"
import type { BoxConfig } from "../core/domain.js"
import { ConfigError } from "./errors.js"

// CHANGE: read the process environment once and decode it into BoxConfig
// PURITY: SHELL
// EFFECT: Effect<BoxConfig, ConfigError, never>
// INVARIANT: unknown input never leaks past this boundary
// COMPLEXITY: O(v) where v = |variables|
export const loadBoxConfig = (
  env: ConfigEnv = process.env
): Effect.Effect<BoxConfig, ConfigError> =>
  Either.match(resolveBoxConfig(env), {
    onLeft: ({ message, variable }) => Effect.fail(new ConfigError({ variable, message })),
    onRight: (config) => Effect.succeed(config)
  })
