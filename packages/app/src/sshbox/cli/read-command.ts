import { Effect, Either, pipe } from "effect"

import type { Command, ParseError } from "@sshbox/lib/core/domain"

import { parseArgs } from "./parser.js"

// CHANGE: read and parse CLI arguments from process.argv
// PURITY: SHELL
// EFFECT: Effect<Command, ParseError, never>
// INVARIANT: errors are typed as ParseError
// COMPLEXITY: O(n) where n = |argv|
export const readCommand: Effect.Effect<Command, ParseError> = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.map((args) => parseArgs(args)),
  Effect.flatMap((result) =>
    Either.match(result, {
      onLeft: (error) => Effect.fail(error),
      onRight: (command) => Effect.succeed(command)
    })
  )
)
