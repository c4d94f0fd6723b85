import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { readFileSync, statSync } from "node:fs"

import { hostKeyFiles, modeForHostKey } from "../../src/core/host-keys.js"
import { runSshd } from "../../src/usecases/sshd.js"
import { runStartup } from "../../src/usecases/startup.js"
import { makeFakeExecutor, provideFakeExecutor, type RecordedCommand } from "../support/fake-executor.js"
import { makeTestConfig, withTempDir, writeFiles } from "../support/temp-dir.js"

const durableKeys = Object.fromEntries(hostKeyFiles.map((file) => [file.name, `durable ${file.name}\n`]))

const sshdExits = (code: number) => (invocation: RecordedCommand): number =>
  invocation.command === "/usr/sbin/sshd" ? code : 0

describe("runStartup", () => {
  it.effect("rejects missing credentials before touching the system", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path, { sshUsername: "" })
        yield* _(fs.makeDirectory(config.volumePath))
        const recorded: Array<RecordedCommand> = []

        const error = yield* _(
          runStartup(config, { runSshd: true }).pipe(
            provideFakeExecutor(makeFakeExecutor(recorded)),
            Effect.flip
          )
        )

        expect(error._tag).toBe("MissingCredentialsError")
        if (error._tag === "MissingCredentialsError") {
          expect(error.missing).toEqual(["SSH_USERNAME"])
        }
        expect(recorded).toEqual([])
        expect(yield* _(fs.readDirectory(config.volumePath))).toEqual([])
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("rejects a blank password along with a blank login name", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path, { sshUsername: "", sshPassword: "" })

        const error = yield* _(runStartup(config, { runSshd: false }).pipe(
          provideFakeExecutor(makeFakeExecutor([])),
          Effect.flip
        ))

        expect(error._tag).toBe("MissingCredentialsError")
        if (error._tag === "MissingCredentialsError") {
          expect(error.missing).toEqual(["SSH_USERNAME", "SSH_PASSWORD"])
        }
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("provisions and restores keys without sshd when asked", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path)
        yield* _(writeFiles(config.hostKeyBackupDir, durableKeys))
        yield* _(writeFiles(config.hostKeyDir, {}))
        const recorded: Array<RecordedCommand> = []

        const report = yield* _(
          runStartup(config, { runSshd: false }).pipe(provideFakeExecutor(makeFakeExecutor(recorded)))
        )

        expect(report.backupScheduled).toBe(false)
        expect(report.outcomes.filter((outcome) => outcome._tag === "Failed")).toEqual([])
        expect(recorded.map((entry) => entry.command)).toEqual(["id", "chown"])
        expect(yield* _(fs.readFileString(path.join(config.hostKeyDir, "ssh_host_rsa_key")))).toBe(
          "durable ssh_host_rsa_key\n"
        )
        expect(yield* _(fs.exists(config.sshdConfigPath))).toBe(true)
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("restores the durable key set before sshd starts", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path)
        yield* _(writeFiles(config.hostKeyBackupDir, durableKeys))
        yield* _(writeFiles(config.hostKeyDir, {}))
        const recorded: Array<RecordedCommand> = []
        const seenBySshd: Array<{ readonly name: string; readonly contents: string; readonly mode: number }> = []
        const snapshotOnSshd = (invocation: RecordedCommand): number => {
          if (invocation.command === "/usr/sbin/sshd") {
            for (const file of hostKeyFiles) {
              const target = path.join(config.hostKeyDir, file.name)
              seenBySshd.push({
                name: file.name,
                contents: readFileSync(target, "utf8"),
                mode: statSync(target).mode & 0o777
              })
            }
          }
          return 0
        }

        const report = yield* _(
          runStartup(config, { runSshd: true }).pipe(provideFakeExecutor(makeFakeExecutor(recorded, snapshotOnSshd)))
        )

        expect(report.backupScheduled).toBe(false)
        expect(seenBySshd).toEqual(
          hostKeyFiles.map((file) => ({
            name: file.name,
            contents: `durable ${file.name}\n`,
            mode: modeForHostKey(file)
          }))
        )
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("schedules a first-run backup and hands over to sshd", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path, { backup: { pollIntervalMs: 10, timeoutMs: 50 } })
        yield* _(fs.makeDirectory(config.volumePath))
        const recorded: Array<RecordedCommand> = []

        const report = yield* _(
          runStartup(config, { runSshd: true }).pipe(provideFakeExecutor(makeFakeExecutor(recorded, sshdExits(0))))
        )

        expect(report.backupScheduled).toBe(true)
        const last = recorded[recorded.length - 1]
        expect(last?.command).toBe("/usr/sbin/sshd")
        expect(last?.args).toEqual(["-D"])
        expect(last?.env).toEqual({ HOST: "0.0.0.0", HOSTNAME: "0.0.0.0" })
      })
    ).pipe(Effect.provide(NodeContext.layer)))
})

describe("runSshd", () => {
  it.effect("fails with the sshd exit code", () =>
    withTempDir((root) =>
      Effect.gen(function*(_) {
        const path = yield* _(Path.Path)
        const config = makeTestConfig(root, path, { bindHost: "127.0.0.1" })
        const recorded: Array<RecordedCommand> = []

        const error = yield* _(
          runSshd(config).pipe(provideFakeExecutor(makeFakeExecutor(recorded, sshdExits(255))), Effect.flip)
        )

        expect(error._tag).toBe("SshdExitError")
        if (error._tag === "SshdExitError") {
          expect(error.exitCode).toBe(255)
          expect(error.sshdPath).toBe("/usr/sbin/sshd")
        }
        expect(recorded[0]?.env).toEqual({ HOST: "127.0.0.1", HOSTNAME: "0.0.0.0" })
      })
    ).pipe(Effect.provide(NodeContext.layer)))
})
