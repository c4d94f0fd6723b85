import { Match } from "effect"

import type { ParseError } from "./domain.js"

// CHANGE: normalize parse errors into deterministic messages
// PURITY: CORE
// EFFECT: Effect<string, never, never>
// INVARIANT: each ParseError maps to exactly one message
// COMPLEXITY: O(1)
export const formatParseError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "UnknownCommand" }, ({ command }) => `Unknown command: ${command}`),
    Match.when({ _tag: "UnknownOption" }, ({ option }) => `Unknown option: ${option}`),
    Match.when({ _tag: "MissingOptionValue" }, ({ option }) => `Missing value for option: ${option}`),
    Match.when({ _tag: "MissingRequiredOption" }, ({ option }) => `Missing required option: ${option}`),
    Match.when({ _tag: "InvalidOption" }, ({ option, reason }) => `Invalid option ${option}: ${reason}`),
    Match.when({ _tag: "UnexpectedArgument" }, ({ value }) => `Unexpected argument: ${value}`),
    Match.exhaustive
  )
