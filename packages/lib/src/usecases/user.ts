import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import { userHomeDir } from "../core/config.js"
import type { BoxConfig } from "../core/domain.js"
import type { StepOutcome } from "../core/outcome.js"
import {
  renderCommand,
  runCommandExitCode,
  runCommandWithExitCodes,
  type RunCommandSpec
} from "../shell/command-runner.js"
import { CommandFailedError } from "../shell/errors.js"
import { attemptStep, skipStep } from "../shell/steps.js"
import { type FsPathContext, withFsPathContext } from "./runtime.js"

export interface UserReport {
  readonly outcomes: ReadonlyArray<StepOutcome>
}

const runChecked = (spec: RunCommandSpec) =>
  runCommandWithExitCodes(
    spec,
    [0],
    (exitCode) => new CommandFailedError({ command: renderCommand(spec), exitCode })
  )

// Passwords go through stdin so they never show up in a process listing.
const chpasswd = (username: string, password: string) =>
  runChecked({ command: "chpasswd", args: [], stdin: `${username}:${password}\n` })

export const countAuthorizedKeys = (keys: string): number =>
  keys.split("\n").filter((line) => {
    const trimmed = line.trim()
    return trimmed.length > 0 && !trimmed.startsWith("#")
  }).length

const setRootPassword = (
  config: BoxConfig
): Effect.Effect<StepOutcome, never, CommandExecutor.CommandExecutor> =>
  config.rootPassword === undefined
    ? skipStep("root password", "ROOT_PASSWORD not set")
    : attemptStep("root password", Effect.as(chpasswd("root", config.rootPassword), "set"))

export const userExists = (
  username: string
): Effect.Effect<boolean, never, CommandExecutor.CommandExecutor> =>
  runCommandExitCode({ command: "id", args: [username], quiet: true }).pipe(
    Effect.map((exitCode) => exitCode === 0),
    Effect.orElseSucceed(() => false)
  )

const createUser = (config: BoxConfig) =>
  Effect.gen(function*(_) {
    const username = config.sshUsername
    if (yield* _(userExists(username))) {
      return yield* _(skipStep("login user", `${username} already exists`))
    }
    return yield* _(
      attemptStep(
        "login user",
        Effect.gen(function*(_) {
          yield* _(runChecked({ command: "useradd", args: ["-ms", "/bin/bash", username] }))
          yield* _(chpasswd(username, config.sshPassword))
          yield* _(runChecked({ command: "usermod", args: ["-aG", "sudo", username] }))
          return `${username} created and added to sudo`
        })
      )
    )
  })

const installAuthorizedKeys = (
  { fs, path }: FsPathContext,
  config: BoxConfig
): Effect.Effect<StepOutcome, never, CommandExecutor.CommandExecutor> => {
  const keys = config.authorizedKeys
  if (keys === undefined) {
    return skipStep("authorized keys", "AUTHORIZED_KEYS not set")
  }
  const sshDir = path.join(userHomeDir(config), ".ssh")
  const keysPath = path.join(sshDir, "authorized_keys")
  const owner = `${config.sshUsername}:${config.sshUsername}`
  return attemptStep(
    "authorized keys",
    Effect.gen(function*(_) {
      yield* _(fs.makeDirectory(sshDir, { recursive: true }))
      yield* _(fs.writeFileString(keysPath, `${keys}\n`))
      yield* _(runChecked({ command: "chown", args: ["-R", owner, sshDir] }))
      yield* _(fs.chmod(sshDir, 0o700))
      yield* _(fs.chmod(keysPath, 0o600))
      return `${countAuthorizedKeys(keys)} key(s) written to ${keysPath}`
    })
  )
}

const createWorkspace = ({ fs, path }: FsPathContext, config: BoxConfig) => {
  const devDir = path.join(userHomeDir(config), "dev")
  return attemptStep(
    "workspace directory",
    Effect.gen(function*(_) {
      yield* _(fs.makeDirectory(devDir, { recursive: true }))
      yield* _(runChecked({ command: "chown", args: [`${config.sshUsername}:${config.sshUsername}`, devDir] }))
      return devDir
    })
  )
}

// CHANGE: provision root password, login user, authorized keys and workspace
// PURITY: SHELL
// EFFECT: Effect<UserReport, never, FileSystem | Path | CommandExecutor>
// INVARIANT: an existing user is never recreated and its password is left alone
// COMPLEXITY: O(1) commands
export const provisionUser = (
  config: BoxConfig
): Effect.Effect<UserReport, never, FileSystem.FileSystem | Path.Path | CommandExecutor.CommandExecutor> =>
  withFsPathContext((context) =>
    Effect.gen(function*(_) {
      const root = yield* _(setRootPassword(config))
      const user = yield* _(createUser(config))
      const keys = yield* _(installAuthorizedKeys(context, config))
      const workspace = yield* _(createWorkspace(context, config))
      return { outcomes: [root, user, keys, workspace] }
    })
  )
