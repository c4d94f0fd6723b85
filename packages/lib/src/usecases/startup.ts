import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type { PlatformError } from "@effect/platform/Error"
import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import type { BoxConfig } from "../core/domain.js"
import { type StepOutcome, summarizeOutcomes } from "../core/outcome.js"
import { MissingCredentialsError, type SshdExitError } from "../shell/errors.js"
import { restoreHostKeys, scheduleHostKeyBackup } from "./host-keys.js"
import { runSshd } from "./sshd.js"
import { configureBanner, configureTimezone, writeSshdConfig } from "./system.js"
import { provisionUser } from "./user.js"
import { setupVolume } from "./volume.js"

export interface StartupOptions {
  readonly runSshd: boolean
}

export interface StartupReport {
  readonly outcomes: ReadonlyArray<StepOutcome>
  readonly backupScheduled: boolean
}

type StartupServices = FileSystem.FileSystem | Path.Path | CommandExecutor.CommandExecutor

export const checkCredentials = (config: BoxConfig): Effect.Effect<void, MissingCredentialsError> => {
  const missing = [
    ...(config.sshUsername.length === 0 ? ["SSH_USERNAME" as const] : []),
    ...(config.sshPassword.length === 0 ? ["SSH_PASSWORD" as const] : [])
  ]
  return missing.length === 0 ? Effect.void : Effect.fail(new MissingCredentialsError({ missing }))
}

// CHANGE: provision the box, restore its identity and start sshd
// PURITY: SHELL
// EFFECT: Effect<StartupReport, MissingCredentialsError | SshdExitError | PlatformError, FileSystem | Path | CommandExecutor>
// INVARIANT: host keys are restored before sshd starts; the backup never blocks sshd
// INVARIANT: only missing credentials or sshd itself fail the sequence
// COMPLEXITY: O(volume entries + k)
export const runStartup = (
  config: BoxConfig,
  options: StartupOptions
): Effect.Effect<StartupReport, MissingCredentialsError | SshdExitError | PlatformError, StartupServices> =>
  Effect.gen(function*(_) {
    yield* _(checkCredentials(config))
    yield* _(Effect.log(`Starting SSH box for ${config.sshUsername}`))

    const volume = yield* _(setupVolume(config))
    const timezone = yield* _(configureTimezone(config))
    const banner = yield* _(configureBanner(config))
    const user = yield* _(provisionUser(config))
    const sshdConfig = yield* _(writeSshdConfig(config))
    const restore = yield* _(restoreHostKeys(config))

    const outcomes = [
      ...volume.outcomes,
      timezone,
      banner,
      ...user.outcomes,
      sshdConfig,
      ...restore.outcomes
    ]
    const summary = summarizeOutcomes(outcomes)
    yield* _(
      Effect.log(
        `Provisioning finished: ${summary.succeeded} ok, ${summary.skipped} skipped, ${summary.failed} failed`
      )
    )

    if (!options.runSshd) {
      return { outcomes, backupScheduled: false }
    }
    if (restore.backupNeeded) {
      yield* _(scheduleHostKeyBackup(config))
    }
    yield* _(runSshd(config))
    return { outcomes, backupScheduled: restore.backupNeeded }
  })
