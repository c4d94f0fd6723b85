import * as Command from "@effect/platform/Command"
import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type { PlatformError } from "@effect/platform/Error"
import { Effect, pipe } from "effect"

export type RunCommandSpec = {
  readonly command: string
  readonly args: ReadonlyArray<string>
  readonly stdin?: string | undefined
  readonly env?: Readonly<Record<string, string>> | undefined
  readonly quiet?: boolean | undefined
}

export const renderCommand = (spec: RunCommandSpec): string => [spec.command, ...spec.args].join(" ")

const buildCommand = (spec: RunCommandSpec) => {
  const output = spec.quiet === true ? "pipe" : "inherit"
  const base = pipe(
    Command.make(spec.command, ...spec.args),
    Command.stdout(output),
    Command.stderr(output)
  )
  const withEnv = spec.env === undefined ? base : Command.env(base, spec.env)
  return spec.stdin === undefined ? withEnv : Command.feed(withEnv, spec.stdin)
}

const ensureExitCode = <E>(
  exitCode: number,
  okExitCodes: ReadonlyArray<number>,
  onFailure: (exitCode: number) => E
): Effect.Effect<number, E> =>
  okExitCodes.includes(exitCode)
    ? Effect.succeed(exitCode)
    : Effect.fail(onFailure(exitCode))

// CHANGE: run a command and return the exit code
// PURITY: SHELL
// EFFECT: Effect<number, PlatformError, CommandExecutor>
// INVARIANT: stdout/stderr are inherited unless quiet
// COMPLEXITY: O(command)
export const runCommandExitCode = (
  spec: RunCommandSpec
): Effect.Effect<number, PlatformError, CommandExecutor.CommandExecutor> =>
  Effect.map(Command.exitCode(buildCommand(spec)), Number)

export const runCommandWithExitCodes = <E>(
  spec: RunCommandSpec,
  okExitCodes: ReadonlyArray<number>,
  onFailure: (exitCode: number) => E
): Effect.Effect<void, E | PlatformError, CommandExecutor.CommandExecutor> =>
  Effect.gen(function*(_) {
    const exitCode = yield* _(runCommandExitCode(spec))
    yield* _(ensureExitCode(exitCode, okExitCodes, onFailure))
  })
