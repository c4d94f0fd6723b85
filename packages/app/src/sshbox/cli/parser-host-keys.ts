import { Either, Match } from "effect"

import type { Command, ParseError } from "@sshbox/lib/core/domain"

import { parsePositiveMillis, parseRawOptions } from "./parser-options.js"

const invalidAction = (group: string, value: string): ParseError => ({
  _tag: "InvalidOption",
  option: group,
  reason: `unknown action: ${value}`
})

export const rejectArgs = (
  args: ReadonlyArray<string>,
  command: Command
): Either.Either<Command, ParseError> =>
  args.length > 0
    ? Either.left({ _tag: "UnexpectedArgument", value: args[0] ?? "" })
    : Either.right(command)

const parseBackup = (args: ReadonlyArray<string>): Either.Either<Command, ParseError> =>
  Either.gen(function*(_) {
    const raw = yield* _(parseRawOptions(args))
    if (raw.runSshd !== undefined) {
      return yield* _(Either.left<ParseError>({ _tag: "UnknownOption", option: "--no-sshd" }))
    }
    const timeoutMs = yield* _(parsePositiveMillis("--timeout-ms", raw.timeoutMs))
    const pollIntervalMs = yield* _(parsePositiveMillis("--poll-interval-ms", raw.pollIntervalMs))
    const command: Command = { _tag: "HostKeysBackup", timeoutMs, pollIntervalMs }
    return command
  })

export const parseHostKeys = (args: ReadonlyArray<string>): Either.Either<Command, ParseError> => {
  const action = args[0]?.trim()
  if (!action || action.length === 0) {
    return Either.left({ _tag: "MissingRequiredOption", option: "host-keys <action>" })
  }

  const rest = args.slice(1)

  return Match.value(action).pipe(
    Match.when("restore", () => rejectArgs(rest, { _tag: "HostKeysRestore" })),
    Match.when("backup", () => parseBackup(rest)),
    Match.when("status", () => rejectArgs(rest, { _tag: "HostKeysStatus" })),
    Match.orElse(() => Either.left(invalidAction("host-keys", action)))
  )
}

export const parseVolume = (args: ReadonlyArray<string>): Either.Either<Command, ParseError> => {
  const action = args[0]?.trim()
  if (!action || action.length === 0) {
    return Either.left({ _tag: "MissingRequiredOption", option: "volume <action>" })
  }
  return action === "setup"
    ? rejectArgs(args.slice(1), { _tag: "VolumeSetup" })
    : Either.left(invalidAction("volume", action))
}
