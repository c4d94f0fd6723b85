import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Duration, Effect, Fiber } from "effect"

import type { BackupPolicy, BoxConfig } from "../../src/core/domain.js"
import { hostKeyFiles } from "../../src/core/host-keys.js"
import { isFailed } from "../../src/core/outcome.js"
import { backupHostKeys, restoreHostKeys, scheduleHostKeyBackup } from "../../src/usecases/host-keys.js"
import { makeTestConfig, withTempDir, writeFiles } from "../support/temp-dir.js"

const allKeys = (label: string): Record<string, string> =>
  Object.fromEntries(hostKeyFiles.map((file) => [file.name, `${label} ${file.name}\n`]))

const ed25519Pair = (label: string): Record<string, string> => ({
  ssh_host_ed25519_key: `${label} ssh_host_ed25519_key\n`,
  "ssh_host_ed25519_key.pub": `${label} ssh_host_ed25519_key.pub\n`
})

const fastPolicy: BackupPolicy = { pollIntervalMs: 10, timeoutMs: 2000 }

const shortPolicy: BackupPolicy = { pollIntervalMs: 10, timeoutMs: 150 }

const withConfig = <A, E, R>(use: (config: BoxConfig) => Effect.Effect<A, E, R>) =>
  withTempDir((root) =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      return yield* _(use(makeTestConfig(root, path, { backup: fastPolicy })))
    })
  )

const readDir = (dir: string, names: ReadonlyArray<string>) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const contents: Record<string, string | null> = {}
    for (const name of names) {
      const target = path.join(dir, name)
      contents[name] = (yield* _(fs.exists(target))) ? yield* _(fs.readFileString(target)) : null
    }
    return contents
  })

const modeOf = (target: string) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const info = yield* _(fs.stat(target))
    return info.mode & 0o777
  })

const hostKeyNames = hostKeyFiles.map((file) => file.name)

describe("restoreHostKeys", () => {
  it.effect("copies a complete durable set with canonical modes", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        const path = yield* _(Path.Path)
        yield* _(writeFiles(config.hostKeyBackupDir, allKeys("durable")))
        for (const name of hostKeyNames) {
          yield* _(fs.chmod(path.join(config.hostKeyBackupDir, name), 0o640))
        }
        yield* _(writeFiles(config.hostKeyDir, ed25519Pair("stale")))

        const report = yield* _(restoreHostKeys(config))

        expect(report.plan._tag).toBe("RestoreComplete")
        expect(report.backupNeeded).toBe(false)
        expect(report.outcomes.every((outcome) => outcome._tag === "Succeeded")).toBe(true)
        expect(yield* _(readDir(config.hostKeyDir, hostKeyNames))).toEqual(allKeys("durable"))
        for (const file of hostKeyFiles) {
          const mode = yield* _(modeOf(path.join(config.hostKeyDir, file.name)))
          expect(mode).toBe(file.role === "private" ? 0o600 : 0o644)
        }
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("gives the same result when run twice", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        yield* _(writeFiles(config.hostKeyBackupDir, allKeys("durable")))
        yield* _(writeFiles(config.hostKeyDir, {}))

        const first = yield* _(restoreHostKeys(config))
        const afterFirst = yield* _(readDir(config.hostKeyDir, hostKeyNames))
        const second = yield* _(restoreHostKeys(config))

        expect(second.plan._tag).toBe(first.plan._tag)
        expect(second.outcomes.map((outcome) => outcome._tag)).toEqual(first.outcomes.map((outcome) => outcome._tag))
        expect(yield* _(readDir(config.hostKeyDir, hostKeyNames))).toEqual(afterFirst)
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("leaves ephemeral keys alone when the volume is missing", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(writeFiles(config.hostKeyDir, ed25519Pair("ephemeral")))

        const report = yield* _(restoreHostKeys(config))

        expect(report.plan._tag).toBe("EphemeralOnly")
        expect(report.backupNeeded).toBe(false)
        expect(report.outcomes.map((outcome) => outcome._tag)).toEqual(["Skipped"])
        expect(yield* _(readDir(config.hostKeyDir, Object.keys(ed25519Pair("x"))))).toEqual(ed25519Pair("ephemeral"))
        expect(yield* _(fs.exists(config.hostKeyBackupDir))).toBe(false)
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("prepares the durable store on first run without copying", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(fs.makeDirectory(config.volumePath, { recursive: true }))
        yield* _(writeFiles(config.hostKeyDir, ed25519Pair("ephemeral")))

        const report = yield* _(restoreHostKeys(config))

        expect(report.plan._tag).toBe("FirstRun")
        expect(report.backupNeeded).toBe(true)
        expect(report.outcomes.map((outcome) => outcome.step)).toEqual(["prepare host key backup dir"])
        expect(yield* _(fs.readDirectory(config.hostKeyBackupDir))).toEqual([])
        expect(yield* _(readDir(config.hostKeyDir, Object.keys(ed25519Pair("x"))))).toEqual(ed25519Pair("ephemeral"))
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("restores only the pair that exists in a partial store", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        yield* _(writeFiles(config.hostKeyBackupDir, ed25519Pair("durable")))
        yield* _(writeFiles(config.hostKeyDir, { ssh_host_rsa_key: "ephemeral rsa\n" }))

        const report = yield* _(restoreHostKeys(config))

        expect(report.plan._tag).toBe("RestorePartial")
        expect(report.backupNeeded).toBe(true)
        expect(report.outcomes.map((outcome) => outcome.step)).toEqual([
          "prepare host key backup dir",
          "restore ssh_host_ed25519_key",
          "chmod ssh_host_ed25519_key",
          "restore ssh_host_ed25519_key.pub",
          "chmod ssh_host_ed25519_key.pub"
        ])
        expect(yield* _(readDir(config.hostKeyDir, ["ssh_host_rsa_key", "ssh_host_ed25519_key"]))).toEqual({
          ssh_host_rsa_key: "ephemeral rsa\n",
          ssh_host_ed25519_key: "durable ssh_host_ed25519_key\n"
        })
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.effect("reports a failed copy without aborting the remaining files", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        yield* _(writeFiles(config.hostKeyBackupDir, allKeys("durable")))

        const report = yield* _(restoreHostKeys(config))

        expect(report.plan._tag).toBe("RestoreComplete")
        const failures = report.outcomes.filter(isFailed)
        expect(failures.map((outcome) => outcome.step)).toEqual(hostKeyNames.map((name) => `restore ${name}`))
        const path = yield* _(Path.Path)
        const source = path.join(config.hostKeyBackupDir, "ssh_host_rsa_key")
        expect(failures[0]?.error.startsWith(`FileSystem.copyFile NotFound (${source})`)).toBe(true)
      })
    ).pipe(Effect.provide(NodeContext.layer)))
})

describe("backupHostKeys", () => {
  it.live("copies a complete ephemeral set into the volume", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(fs.makeDirectory(config.volumePath, { recursive: true }))
        yield* _(writeFiles(config.hostKeyDir, allKeys("ephemeral")))

        const report = yield* _(backupHostKeys(config))

        expect(report.ready).toBe(true)
        expect(report.outcomes.map((outcome) => outcome.step)).toEqual([
          "create host key backup dir",
          ...hostKeyNames.map((name) => `back up ${name}`),
          "host key backup ownership"
        ])
        expect(report.outcomes.every((outcome) => outcome._tag === "Succeeded")).toBe(true)
        expect(yield* _(readDir(config.hostKeyBackupDir, hostKeyNames))).toEqual(allKeys("ephemeral"))
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("checks before the first poll interval elapses", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(fs.makeDirectory(config.volumePath, { recursive: true }))
        yield* _(writeFiles(config.hostKeyDir, allKeys("ephemeral")))

        const report = yield* _(backupHostKeys(config, { pollIntervalMs: 500, timeoutMs: 100 }))

        expect(report.ready).toBe(true)
        expect(yield* _(readDir(config.hostKeyBackupDir, hostKeyNames))).toEqual(allKeys("ephemeral"))
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("waits for keys that appear during the window", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(fs.makeDirectory(config.volumePath, { recursive: true }))
        yield* _(writeFiles(config.hostKeyDir, ed25519Pair("ephemeral")))

        const staging = `${config.hostKeyDir}-staging`
        yield* _(writeFiles(staging, allKeys("ephemeral")))
        // keys appear fully written, one rename at a time
        const publish = Effect.forEach(hostKeyNames, (name) =>
          fs.rename(`${staging}/${name}`, `${config.hostKeyDir}/${name}`))
        const late = yield* _(Effect.fork(Effect.delay(publish, Duration.millis(60))))
        const report = yield* _(backupHostKeys(config))
        yield* _(Fiber.join(late))

        expect(report.ready).toBe(true)
        expect(yield* _(readDir(config.hostKeyBackupDir, hostKeyNames))).toEqual(allKeys("ephemeral"))
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("leaves the durable store unchanged when the set never completes", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        yield* _(writeFiles(config.hostKeyBackupDir, { "ssh_host_rsa_key.pub": "durable rsa pub\n" }))
        yield* _(writeFiles(config.hostKeyDir, ed25519Pair("ephemeral")))

        const report = yield* _(backupHostKeys(config, shortPolicy))

        expect(report.ready).toBe(false)
        expect(report.outcomes.map((outcome) => outcome._tag)).toEqual(["Skipped"])
        expect(yield* _(readDir(config.hostKeyBackupDir, hostKeyNames))).toEqual({
          ssh_host_rsa_key: null,
          "ssh_host_rsa_key.pub": "durable rsa pub\n",
          ssh_host_ecdsa_key: null,
          "ssh_host_ecdsa_key.pub": null,
          ssh_host_ed25519_key: null,
          "ssh_host_ed25519_key.pub": null
        })
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("skips when there is no volume", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        const fs = yield* _(FileSystem.FileSystem)
        yield* _(writeFiles(config.hostKeyDir, allKeys("ephemeral")))

        const report = yield* _(backupHostKeys(config))

        expect(report.ready).toBe(false)
        expect(report.outcomes.map((outcome) => outcome.step)).toEqual(["host key backup"])
        expect(yield* _(fs.exists(config.volumePath))).toBe(false)
      })
    ).pipe(Effect.provide(NodeContext.layer)))

  it.live("turns a partial restore into a complete one on the next start", () =>
    withConfig((config) =>
      Effect.gen(function*(_) {
        yield* _(writeFiles(config.hostKeyBackupDir, ed25519Pair("durable")))
        yield* _(writeFiles(config.hostKeyDir, allKeys("generated")))

        const first = yield* _(restoreHostKeys(config))
        expect(first.plan._tag).toBe("RestorePartial")

        const backup = yield* _(Fiber.join(yield* _(scheduleHostKeyBackup(config))))
        expect(backup.ready).toBe(true)

        const second = yield* _(restoreHostKeys(config))
        expect(second.plan._tag).toBe("RestoreComplete")
        expect(second.backupNeeded).toBe(false)
        expect(yield* _(readDir(config.hostKeyBackupDir, ["ssh_host_ed25519_key", "ssh_host_rsa_key"]))).toEqual({
          ssh_host_ed25519_key: "durable ssh_host_ed25519_key\n",
          ssh_host_rsa_key: "generated ssh_host_rsa_key\n"
        })
      })
    ).pipe(Effect.provide(NodeContext.layer)))
})
