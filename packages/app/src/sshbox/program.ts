import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import type { BoxConfig, Command } from "@sshbox/lib/core/domain"
import { type ConfigEnv, renderBoxConfig, toEffectLogLevel } from "@sshbox/lib/core/config"
import { isFailed, type StepOutcome } from "@sshbox/lib/core/outcome"
import { loadBoxConfig } from "@sshbox/lib/shell/config"
import { type AppError, isParseError, renderError } from "@sshbox/lib/usecases/errors"
import { backupHostKeys, restoreHostKeys } from "@sshbox/lib/usecases/host-keys"
import { inspectHostKeys, renderHostKeyStatus } from "@sshbox/lib/usecases/host-keys-status"
import { runStartup } from "@sshbox/lib/usecases/startup"
import { setupVolume } from "@sshbox/lib/usecases/volume"
import { Console, Effect, Logger, Match, pipe } from "effect"

import { readCommand } from "./cli/read-command.js"

const setExitCode = (code: number) =>
  Effect.sync(() => {
    process.exitCode = code
  })

const logErrorAndExit = (error: AppError) =>
  pipe(
    Effect.logError(renderError(error)),
    Effect.tap(() => setExitCode(1)),
    Effect.asVoid
  )

// Standalone maintenance commands report partial failure through the exit code.
const exitOnFailedSteps = (outcomes: ReadonlyArray<StepOutcome>) =>
  outcomes.some(isFailed) ? setExitCode(1) : Effect.void

const withConfig = <A, E, R>(
  env: ConfigEnv,
  run: (config: BoxConfig) => Effect.Effect<A, E, R>
) =>
  Effect.flatMap(
    loadBoxConfig(env),
    (config) => Logger.withMinimumLogLevel(run(config), toEffectLogLevel(config.logLevel))
  )

type ConfiguredCommand = Exclude<Command, { readonly _tag: "Help" }>

type ProgramServices = FileSystem.FileSystem | Path.Path | CommandExecutor.CommandExecutor

const handleConfiguredCommand = (
  command: ConfiguredCommand,
  config: BoxConfig
): Effect.Effect<void, AppError, ProgramServices> =>
  Match.value(command).pipe(
    Match.when({ _tag: "Start" }, ({ runSshd }) => Effect.asVoid(runStartup(config, { runSshd }))),
    Match.when({ _tag: "HostKeysRestore" }, () =>
      Effect.flatMap(restoreHostKeys(config), ({ outcomes }) => exitOnFailedSteps(outcomes))),
    Match.when({ _tag: "HostKeysBackup" }, ({ pollIntervalMs, timeoutMs }) =>
      Effect.flatMap(
        backupHostKeys(config, {
          pollIntervalMs: pollIntervalMs ?? config.backup.pollIntervalMs,
          timeoutMs: timeoutMs ?? config.backup.timeoutMs
        }),
        ({ outcomes, ready }) => ready ? exitOnFailedSteps(outcomes) : setExitCode(1)
      )),
    Match.when({ _tag: "HostKeysStatus" }, () =>
      Effect.flatMap(inspectHostKeys(config), (status) => Console.log(renderHostKeyStatus(config, status)))),
    Match.when({ _tag: "VolumeSetup" }, () =>
      Effect.flatMap(setupVolume(config), ({ outcomes }) => exitOnFailedSteps(outcomes))),
    Match.when({ _tag: "ShowConfig" }, () => Console.log(renderBoxConfig(config))),
    Match.exhaustive
  )

// CHANGE: dispatch one parsed command against the resolved configuration
// PURITY: SHELL
// EFFECT: Effect<void, AppError, FileSystem | Path | CommandExecutor>
// INVARIANT: help never reads the environment
// COMPLEXITY: O(command)
export const handleCommand = (
  command: Command,
  env: ConfigEnv = process.env
): Effect.Effect<void, AppError, ProgramServices> =>
  command._tag === "Help"
    ? Console.log(command.message)
    : withConfig(env, (config) => handleConfiguredCommand(command, config))

// CHANGE: compose CLI program with typed errors and shell effects
// PURITY: SHELL
// EFFECT: Effect<void, never, FileSystem | Path | CommandExecutor>
// INVARIANT: every AppError is logged once and sets exit code 1
// COMPLEXITY: O(command)
export const program = pipe(
  readCommand,
  Effect.flatMap((command) => handleCommand(command)),
  Effect.catchAll((error: AppError) =>
    isParseError(error)
      ? pipe(
        logErrorAndExit(error),
        Effect.zipRight(Console.log("Run `sshbox help` for usage."))
      )
      : logErrorAndExit(error)
  )
)
