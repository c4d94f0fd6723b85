import { Either, Match } from "effect"

import type { Command, ParseError } from "@sshbox/lib/core/domain"

import { parseHostKeys, parseVolume, rejectArgs } from "./parser-host-keys.js"
import { parseRawOptions } from "./parser-options.js"
import { usageText } from "./usage.js"

const isHelpFlag = (token: string): boolean => token === "--help" || token === "-h"

const helpCommand: Command = { _tag: "Help", message: usageText }
const showConfigCommand: Command = { _tag: "ShowConfig" }

const parseStart = (args: ReadonlyArray<string>): Either.Either<Command, ParseError> =>
  Either.flatMap(parseRawOptions(args), (raw): Either.Either<Command, ParseError> => {
    if (raw.timeoutMs !== undefined) {
      return Either.left({ _tag: "UnknownOption", option: "--timeout-ms" })
    }
    if (raw.pollIntervalMs !== undefined) {
      return Either.left({ _tag: "UnknownOption", option: "--poll-interval-ms" })
    }
    return Either.right({ _tag: "Start", runSshd: raw.runSshd ?? true })
  })

// CHANGE: parse CLI arguments into a typed command
// PURITY: CORE
// EFFECT: Either<Command, ParseError>
// INVARIANT: parse does not perform IO and returns the same result for same argv
// COMPLEXITY: O(n) where n = |argv|
export const parseArgs = (args: ReadonlyArray<string>): Either.Either<Command, ParseError> => {
  if (args.length === 0 || args.some((arg) => isHelpFlag(arg))) {
    return Either.right(helpCommand)
  }

  const command = args[0] ?? ""
  const rest = args.slice(1)
  const unknownCommandError: ParseError = { _tag: "UnknownCommand", command }

  return Match.value(command).pipe(
    Match.when("start", () => parseStart(rest)),
    Match.when("host-keys", () => parseHostKeys(rest)),
    Match.when("volume", () => parseVolume(rest)),
    Match.when("config", () => rejectArgs(rest, showConfigCommand)),
    Match.when("help", () => Either.right(helpCommand)),
    Match.orElse(() => Either.left(unknownCommandError))
  )
}
