import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Duration, Effect, type Fiber, Match } from "effect"

import type { BackupPolicy, BoxConfig } from "../core/domain.js"
import {
  type HostKeyFile,
  hostKeyFiles,
  type HostKeyPlan,
  isCompleteKeySet,
  modeForHostKey,
  planHostKeyPersistence,
  planNeedsBackup,
  planRestoresFiles
} from "../core/host-keys.js"
import type { StepOutcome } from "../core/outcome.js"
import { chownRecursive, isDirectory, listPresentFiles } from "../shell/files.js"
import { attemptStep, skipStep } from "../shell/steps.js"
import { type FsPathContext, withFsPathContext } from "./runtime.js"

const hostKeyNames = hostKeyFiles.map((file) => file.name)

export interface RestoreReport {
  readonly plan: HostKeyPlan
  readonly outcomes: ReadonlyArray<StepOutcome>
  readonly backupNeeded: boolean
}

export interface BackupReport {
  readonly ready: boolean
  readonly outcomes: ReadonlyArray<StepOutcome>
}

export const describePlan = (plan: HostKeyPlan): string =>
  Match.value(plan).pipe(
    Match.when(
      { _tag: "EphemeralOnly" },
      () => "No volume detected: host keys are ephemeral and will change on every container restart"
    ),
    Match.when({ _tag: "RestoreComplete" }, () => "Restoring SSH host keys from volume"),
    Match.when(
      { _tag: "RestorePartial" },
      ({ missing }) =>
        `Volume holds a partial host key set (missing: ${
          missing.map((file) => file.name).join(", ")
        }); restoring what exists, sshd supplies the rest`
    ),
    Match.when(
      { _tag: "FirstRun" },
      () => "No host keys in volume yet: keys used by sshd will be backed up once present"
    ),
    Match.exhaustive
  )

const prepareBackupDir = ({ fs, path }: FsPathContext, config: BoxConfig) =>
  attemptStep(
    "prepare host key backup dir",
    Effect.gen(function*(_) {
      yield* _(fs.makeDirectory(config.hostKeyBackupDir, { recursive: true }))
      yield* _(chownRecursive(fs, path, config.hostKeyBackupDir, config.ownership))
      return `${config.hostKeyBackupDir} owned by ${config.ownership.uid}:${config.ownership.gid}`
    })
  )

const restoreFile = (
  { fs, path }: FsPathContext,
  config: BoxConfig,
  file: HostKeyFile
): Effect.Effect<ReadonlyArray<StepOutcome>> =>
  Effect.gen(function*(_) {
    const source = path.join(config.hostKeyBackupDir, file.name)
    const target = path.join(config.hostKeyDir, file.name)
    const copied = yield* _(
      attemptStep(`restore ${file.name}`, Effect.as(fs.copyFile(source, target), `copied to ${target}`))
    )
    if (copied._tag !== "Succeeded") {
      return [copied]
    }
    const mode = modeForHostKey(file)
    const chmodded = yield* _(
      attemptStep(`chmod ${file.name}`, Effect.as(fs.chmod(target, mode), `mode ${mode.toString(8)}`))
    )
    return [copied, chmodded]
  })

// CHANGE: restore host keys from the volume before sshd reads them
// PURITY: SHELL
// EFFECT: Effect<RestoreReport, never, FileSystem | Path>
// INVARIANT: complete durable set -> ephemeral files byte-identical with 0600/0644 modes
// INVARIANT: unreachable or empty durable store -> zero copies
// COMPLEXITY: O(k) where k = |hostKeyFiles|
export const restoreHostKeys = (
  config: BoxConfig
): Effect.Effect<RestoreReport, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext((context) =>
    Effect.gen(function*(_) {
      const reachable = yield* _(isDirectory(context.fs, config.volumePath))
      if (!reachable) {
        const plan: HostKeyPlan = { _tag: "EphemeralOnly" }
        const outcome = yield* _(skipStep("host key persistence", describePlan(plan)))
        return { plan, outcomes: [outcome], backupNeeded: false }
      }

      const outcomes: Array<StepOutcome> = []
      outcomes.push(yield* _(prepareBackupDir(context, config)))

      const durable = yield* _(listPresentFiles(context.fs, context.path, config.hostKeyBackupDir, hostKeyNames))
      const plan = planHostKeyPersistence(true, durable)
      yield* _(Effect.log(describePlan(plan)))

      for (const file of planRestoresFiles(plan)) {
        outcomes.push(...(yield* _(restoreFile(context, config, file))))
      }

      return { plan, outcomes, backupNeeded: planNeedsBackup(plan) }
    })
  )

// PURITY: SHELL
// EFFECT: Effect<boolean, never, never>
// INVARIANT: true only when all six files exist in dir by the deadline
// INVARIANT: the first check runs immediately and the last one when the deadline fires
// COMPLEXITY: O(timeout / interval)
export const waitForCompleteKeySet = (
  { fs, path }: FsPathContext,
  dir: string,
  policy: BackupPolicy
): Effect.Effect<boolean> => {
  const check = Effect.map(listPresentFiles(fs, path, dir, hostKeyNames), isCompleteKeySet)
  return check.pipe(
    Effect.tap((ready) => ready ? Effect.void : Effect.sleep(Duration.millis(policy.pollIntervalMs))),
    Effect.repeat({ until: (ready: boolean) => ready }),
    Effect.timeoutTo({
      duration: Duration.millis(policy.timeoutMs),
      onSuccess: (ready: boolean) => Effect.succeed(ready),
      onTimeout: () => check
    }),
    Effect.flatten
  )
}

const backupFile = ({ fs, path }: FsPathContext, config: BoxConfig, file: HostKeyFile) => {
  const source = path.join(config.hostKeyDir, file.name)
  const target = path.join(config.hostKeyBackupDir, file.name)
  return attemptStep(`back up ${file.name}`, Effect.as(fs.copyFile(source, target), `copied to ${target}`))
}

// CHANGE: capture the key set sshd uses into the volume once it is complete
// PURITY: SHELL
// EFFECT: Effect<BackupReport, never, FileSystem | Path>
// INVARIANT: an incomplete ephemeral set leaves the durable store unchanged
// COMPLEXITY: O(timeout / interval + k)
export const backupHostKeys = (
  config: BoxConfig,
  policy: BackupPolicy = config.backup
): Effect.Effect<BackupReport, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext((context) =>
    Effect.gen(function*(_) {
      const reachable = yield* _(isDirectory(context.fs, config.volumePath))
      if (!reachable) {
        const outcome = yield* _(skipStep("host key backup", `no volume at ${config.volumePath}`))
        return { ready: false, outcomes: [outcome] }
      }

      const ready = yield* _(waitForCompleteKeySet(context, config.hostKeyDir, policy))
      if (!ready) {
        const outcome = yield* _(
          skipStep(
            "host key backup",
            `key set in ${config.hostKeyDir} still incomplete after ${policy.timeoutMs}ms; volume left unchanged`
          )
        )
        return { ready: false, outcomes: [outcome] }
      }

      yield* _(Effect.log("Backing up SSH host keys to volume"))
      const outcomes: Array<StepOutcome> = []
      const prepared = yield* _(
        attemptStep(
          "create host key backup dir",
          Effect.as(context.fs.makeDirectory(config.hostKeyBackupDir, { recursive: true }), config.hostKeyBackupDir)
        )
      )
      outcomes.push(prepared)
      for (const file of hostKeyFiles) {
        outcomes.push(yield* _(backupFile(context, config, file)))
      }
      outcomes.push(
        yield* _(
          attemptStep(
            "host key backup ownership",
            Effect.map(
              chownRecursive(context.fs, context.path, config.hostKeyBackupDir, config.ownership),
              (count) => `${count} paths owned by ${config.ownership.uid}:${config.ownership.gid}`
            )
          )
        )
      )
      return { ready: true, outcomes }
    })
  )

// CHANGE: run the backup in the background without blocking sshd startup
// PURITY: SHELL
// EFFECT: Effect<Fiber<BackupReport>, never, FileSystem | Path>
// INVARIANT: the returned fiber is a daemon; nothing awaits it on the start path
// COMPLEXITY: O(1)
export const scheduleHostKeyBackup = (
  config: BoxConfig
): Effect.Effect<Fiber.RuntimeFiber<BackupReport>, never, FileSystem.FileSystem | Path.Path> =>
  Effect.zipLeft(
    Effect.forkDaemon(backupHostKeys(config)),
    Effect.log(
      `Host key backup scheduled (poll every ${config.backup.pollIntervalMs}ms, up to ${config.backup.timeoutMs}ms)`
    )
  )
