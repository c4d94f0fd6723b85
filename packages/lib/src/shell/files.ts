import type { PlatformError } from "@effect/platform/Error"
import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect, Option } from "effect"

import type { Ownership } from "../core/domain.js"

export const isDirectory = (
  fs: FileSystem.FileSystem,
  target: string
): Effect.Effect<boolean> =>
  fs.stat(target).pipe(
    Effect.map((info) => info.type === "Directory"),
    Effect.orElseSucceed(() => false)
  )

export const fileExists = (
  fs: FileSystem.FileSystem,
  target: string
): Effect.Effect<boolean> => fs.exists(target).pipe(Effect.orElseSucceed(() => false))

// PURITY: SHELL
// EFFECT: Effect<ReadonlySet<string>, never, never>
// INVARIANT: unreadable entries count as absent
// COMPLEXITY: O(n) where n = |names|
export const listPresentFiles = (
  fs: FileSystem.FileSystem,
  path: Path.Path,
  dir: string,
  names: ReadonlyArray<string>
): Effect.Effect<ReadonlySet<string>> =>
  Effect.gen(function*(_) {
    const present = new Set<string>()
    for (const name of names) {
      if (yield* _(fileExists(fs, path.join(dir, name)))) {
        present.add(name)
      }
    }
    return present
  })

export const readOwnership = (
  fs: FileSystem.FileSystem,
  target: string
): Effect.Effect<Ownership | null, PlatformError> =>
  Effect.map(fs.stat(target), (info) =>
    Option.match(Option.all({ uid: info.uid, gid: info.gid }), {
      onNone: () => null,
      onSome: (ownership) => ownership
    }))

export const sameOwnership = (left: Ownership | null, right: Ownership): boolean =>
  left !== null && left.uid === right.uid && left.gid === right.gid

export const isSymbolicLink = (
  fs: FileSystem.FileSystem,
  target: string
): Effect.Effect<boolean> => Effect.isSuccess(fs.readLink(target))

// CHANGE: chown a directory tree to a numeric uid:gid
// PURITY: SHELL
// EFFECT: Effect<number, PlatformError, never>
// INVARIANT: symlinks are never followed, so nothing outside root changes owner
// INVARIANT: a failing entry is logged and the walk carries on; only root failures propagate
// COMPLEXITY: O(n) where n = |entries|
export const chownRecursive = (
  fs: FileSystem.FileSystem,
  path: Path.Path,
  root: string,
  ownership: Ownership
): Effect.Effect<number, PlatformError> =>
  Effect.gen(function*(_) {
    yield* _(fs.chown(root, ownership.uid, ownership.gid))
    const entries = yield* _(fs.readDirectory(root, { recursive: true }))
    let changed = 1
    for (const entry of entries) {
      const target = path.join(root, entry)
      if (yield* _(isSymbolicLink(fs, target))) {
        continue
      }
      const applied = yield* _(
        fs.chown(target, ownership.uid, ownership.gid).pipe(
          Effect.as(true),
          Effect.catchAll((error) => Effect.as(Effect.logWarning(`chown ${target}: ${error.message}`), false))
        )
      )
      if (applied) {
        changed += 1
      }
    }
    return changed
  })

export const sameContents = (
  fs: FileSystem.FileSystem,
  left: string,
  right: string
): Effect.Effect<boolean, PlatformError> =>
  Effect.gen(function*(_) {
    const a = yield* _(fs.readFile(left))
    const b = yield* _(fs.readFile(right))
    return Buffer.from(a).equals(Buffer.from(b))
  })
