import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import type { BoxConfig } from "../core/domain.js"
import {
  fingerprintPublicKey,
  type HostKeyFile,
  hostKeyFiles,
  type HostKeyPlan,
  planHostKeyPersistence,
  type PublicKeyFingerprint
} from "../core/host-keys.js"
import { fileExists, isDirectory, listPresentFiles, sameContents } from "../shell/files.js"
import { describePlan } from "./host-keys.js"
import { type FsPathContext, withFsPathContext } from "./runtime.js"

export interface HostKeyFileStatus {
  readonly file: HostKeyFile
  readonly ephemeral: boolean
  readonly durable: boolean
  readonly identical: boolean | null
  readonly fingerprint: PublicKeyFingerprint | null
}

export interface HostKeyStatus {
  readonly volumeReachable: boolean
  readonly plan: HostKeyPlan
  readonly files: ReadonlyArray<HostKeyFileStatus>
}

const inspectFile = (
  { fs, path }: FsPathContext,
  config: BoxConfig,
  file: HostKeyFile,
  volumeReachable: boolean
): Effect.Effect<HostKeyFileStatus> =>
  Effect.gen(function*(_) {
    const ephemeralPath = path.join(config.hostKeyDir, file.name)
    const durablePath = path.join(config.hostKeyBackupDir, file.name)
    const ephemeral = yield* _(fileExists(fs, ephemeralPath))
    const durable = volumeReachable && (yield* _(fileExists(fs, durablePath)))
    const identical = ephemeral && durable
      ? yield* _(sameContents(fs, ephemeralPath, durablePath).pipe(Effect.orElseSucceed(() => null)))
      : null
    const fingerprint = ephemeral && file.role === "public"
      ? yield* _(
        fs.readFileString(ephemeralPath).pipe(
          Effect.map(fingerprintPublicKey),
          Effect.orElseSucceed(() => null)
        )
      )
      : null
    return { file, ephemeral, durable, identical, fingerprint }
  })

// CHANGE: report where each host key lives and whether both copies agree
// PURITY: SHELL
// EFFECT: Effect<HostKeyStatus, never, FileSystem | Path>
// INVARIANT: read-only; never copies, chmods or chowns
// COMPLEXITY: O(k) where k = |hostKeyFiles|
export const inspectHostKeys = (
  config: BoxConfig
): Effect.Effect<HostKeyStatus, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext((context) =>
    Effect.gen(function*(_) {
      const volumeReachable = yield* _(isDirectory(context.fs, config.volumePath))
      const durable = volumeReachable
        ? yield* _(
          listPresentFiles(context.fs, context.path, config.hostKeyBackupDir, hostKeyFiles.map((file) => file.name))
        )
        : new Set<string>()
      const files: Array<HostKeyFileStatus> = []
      for (const file of hostKeyFiles) {
        files.push(yield* _(inspectFile(context, config, file, volumeReachable)))
      }
      return { volumeReachable, plan: planHostKeyPersistence(volumeReachable, durable), files }
    })
  )

const yesNo = (value: boolean): string => value ? "yes" : "no"

const renderIdentical = (value: boolean | null): string => value === null ? "-" : yesNo(value)

export const renderHostKeyStatus = (config: BoxConfig, status: HostKeyStatus): string => {
  const header = [
    `Volume: ${config.volumePath} (${status.volumeReachable ? "mounted" : "not mounted"})`,
    `Ephemeral keys: ${config.hostKeyDir}`,
    `Durable keys: ${config.hostKeyBackupDir}`,
    `Plan on next start: ${describePlan(status.plan)}`,
    ""
  ]
  const rows = status.files.map((entry) => {
    const base =
      `${entry.file.name}: ephemeral=${yesNo(entry.ephemeral)} durable=${yesNo(entry.durable)} identical=${
        renderIdentical(entry.identical)
      }`
    return entry.fingerprint === null
      ? base
      : `${base} ${entry.fingerprint.keyType} ${entry.fingerprint.fingerprint}`
  })
  return [...header, ...rows].join("\n")
}
