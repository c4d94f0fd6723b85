import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import { type BoxConfig, volumeDirectories } from "../core/domain.js"
import type { StepOutcome } from "../core/outcome.js"
import { OwnershipNotAppliedError } from "../shell/errors.js"
import { chownRecursive, isDirectory, readOwnership, sameOwnership } from "../shell/files.js"
import { attemptStep, skipStep } from "../shell/steps.js"
import { type FsPathContext, withFsPathContext } from "./runtime.js"

export interface VolumeReport {
  readonly present: boolean
  readonly outcomes: ReadonlyArray<StepOutcome>
}

const renderOwner = (ownership: { readonly uid: number; readonly gid: number } | null): string =>
  ownership === null ? "unknown" : `${ownership.uid}:${ownership.gid}`

const fixOwnership = ({ fs, path }: FsPathContext, config: BoxConfig) =>
  Effect.gen(function*(_) {
    const current = yield* _(readOwnership(fs, config.volumePath).pipe(Effect.orElseSucceed(() => null)))
    if (sameOwnership(current, config.ownership)) {
      return yield* _(skipStep("volume ownership", `already ${renderOwner(current)}`))
    }
    return yield* _(
      attemptStep(
        "volume ownership",
        Effect.gen(function*(_) {
          yield* _(chownRecursive(fs, path, config.volumePath, config.ownership))
          const after = yield* _(readOwnership(fs, config.volumePath))
          if (!sameOwnership(after, config.ownership)) {
            return yield* _(
              Effect.fail(new OwnershipNotAppliedError({ path: config.volumePath, actual: renderOwner(after) }))
            )
          }
          return `${renderOwner(current)} -> ${renderOwner(after)}`
        })
      )
    )
  })

const createDirectories = ({ fs, path }: FsPathContext, config: BoxConfig) =>
  attemptStep(
    "volume directories",
    Effect.gen(function*(_) {
      for (const name of volumeDirectories) {
        yield* _(fs.makeDirectory(path.join(config.volumePath, name), { recursive: true }))
      }
      yield* _(chownRecursive(fs, path, config.volumePath, config.ownership))
      return volumeDirectories.map((name) => `${name}/`).join(" ")
    })
  )

const probeWritable = ({ fs, path }: FsPathContext, config: BoxConfig) => {
  const probe = path.join(config.volumePath, ".write_test")
  return attemptStep(
    "volume write probe",
    Effect.gen(function*(_) {
      yield* _(fs.writeFileString(probe, ""))
      yield* _(fs.remove(probe))
      return `${config.volumePath} is writable`
    })
  )
}

// CHANGE: hand the mounted volume to the login user and lay out its directories
// PURITY: SHELL
// EFFECT: Effect<VolumeReport, never, FileSystem | Path>
// INVARIANT: a missing volume is a skip, never a failure
// COMPLEXITY: O(n) where n = |volume entries|
export const setupVolume = (
  config: BoxConfig
): Effect.Effect<VolumeReport, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext((context) =>
    Effect.gen(function*(_) {
      const present = yield* _(isDirectory(context.fs, config.volumePath))
      if (!present) {
        const outcome = yield* _(
          skipStep("volume", `not found at ${config.volumePath} (normal for local development)`)
        )
        return { present, outcomes: [outcome] }
      }
      yield* _(Effect.log(`Volume detected at ${config.volumePath}`))
      const ownership = yield* _(fixOwnership(context, config))
      const directories = yield* _(createDirectories(context, config))
      const writable = yield* _(probeWritable(context, config))
      return { present, outcomes: [ownership, directories, writable] }
    })
  )
