import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Effect } from "effect"

export type FsPathContext = {
  readonly fs: FileSystem.FileSystem
  readonly path: Path.Path
}

// CHANGE: provide a shared FileSystem/Path context for usecases
// PURITY: SHELL
// EFFECT: Effect<A, E, R | FileSystem | Path>
// INVARIANT: services are resolved once per call
// COMPLEXITY: O(1)
export const withFsPathContext = <A, E, R>(
  run: (context: FsPathContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E, R | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    return yield* _(run({ fs, path }))
  })
