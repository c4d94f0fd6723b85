import type { PlatformError } from "@effect/platform/Error"
import { Match } from "effect"

import type { ParseError } from "../core/domain.js"
import { formatParseError } from "../core/parse-errors.js"
import type {
  CommandFailedError,
  ConfigError,
  MissingCredentialsError,
  SshdExitError
} from "../shell/errors.js"

export type AppError =
  | ParseError
  | ConfigError
  | MissingCredentialsError
  | CommandFailedError
  | SshdExitError
  | PlatformError

type NonParseError = Exclude<AppError, ParseError>

export const isParseError = (error: AppError): error is ParseError =>
  error._tag === "UnknownCommand" ||
  error._tag === "UnknownOption" ||
  error._tag === "MissingOptionValue" ||
  error._tag === "MissingRequiredOption" ||
  error._tag === "InvalidOption" ||
  error._tag === "UnexpectedArgument"

const renderNonParseError = (error: NonParseError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "ConfigError" }, ({ message, variable }) => `Invalid ${variable}: ${message}`),
    Match.when({ _tag: "MissingCredentialsError" }, ({ missing }) =>
      [
        `Missing credentials: ${missing.join(", ")}`,
        "Hint: set SSH_USERNAME and SSH_PASSWORD in the container environment."
      ].join("\n")),
    Match.when(
      { _tag: "CommandFailedError" },
      ({ command, exitCode }) => `${command} failed with exit code ${exitCode}`
    ),
    Match.when({ _tag: "SshdExitError" }, ({ exitCode, sshdPath }) => `${sshdPath} exited with code ${exitCode}`),
    Match.orElse((platformError) => platformError.message)
  )

// CHANGE: render typed application errors into operator-facing text
// PURITY: CORE
// EFFECT: Effect<string, never, never>
// INVARIANT: each AppError maps to exactly one message
// COMPLEXITY: O(1)
export const renderError = (error: AppError): string =>
  isParseError(error) ? formatParseError(error) : renderNonParseError(error)
