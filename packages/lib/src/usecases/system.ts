import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { Effect } from "effect"

import type { BoxConfig } from "../core/domain.js"
import type { StepOutcome } from "../core/outcome.js"
import { renderSshdConfig, sshdDirectivesFor } from "../core/sshd-config.js"
import { UnknownTimezoneError } from "../shell/errors.js"
import { fileExists } from "../shell/files.js"
import { attemptStep, skipStep } from "../shell/steps.js"
import { withFsPathContext } from "./runtime.js"

export const configureTimezone = (
  config: BoxConfig
): Effect.Effect<StepOutcome, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext(({ fs, path }) => {
    const timezone = config.timezone
    if (timezone === undefined) {
      return skipStep("timezone", "TZ not set")
    }
    const zoneinfoPath = path.join(config.zoneinfoDir, timezone)
    return attemptStep(
      "timezone",
      Effect.gen(function*(_) {
        if (!(yield* _(fileExists(fs, zoneinfoPath)))) {
          return yield* _(Effect.fail(new UnknownTimezoneError({ timezone, zoneinfoPath })))
        }
        const linked = yield* _(fs.readLink(config.localtimePath).pipe(Effect.orElseSucceed(() => null)))
        if (linked !== null || (yield* _(fileExists(fs, config.localtimePath)))) {
          yield* _(fs.remove(config.localtimePath))
        }
        yield* _(fs.symlink(zoneinfoPath, config.localtimePath))
        yield* _(fs.writeFileString(config.timezonePath, `${timezone}\n`))
        return timezone
      })
    )
  })

export const configureBanner = (
  config: BoxConfig
): Effect.Effect<StepOutcome, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext(({ fs, path }) => {
    const banner = config.sshBanner
    if (banner === undefined) {
      return skipStep("banner", "SSH_BANNER not set")
    }
    return attemptStep(
      "banner",
      Effect.gen(function*(_) {
        yield* _(fs.makeDirectory(path.dirname(config.bannerPath), { recursive: true }))
        yield* _(fs.writeFileString(config.bannerPath, `${banner}\n`))
        return `written to ${config.bannerPath}`
      })
    )
  })

// CHANGE: converge sshd_config on the directives derived from BoxConfig
// PURITY: SHELL
// EFFECT: Effect<StepOutcome, never, FileSystem | Path>
// INVARIANT: rewriting an already converged file leaves it byte-identical
// COMPLEXITY: O(n) where n = |sshd_config|
export const writeSshdConfig = (
  config: BoxConfig
): Effect.Effect<StepOutcome, never, FileSystem.FileSystem | Path.Path> =>
  withFsPathContext(({ fs, path }) =>
    attemptStep(
      "sshd_config",
      Effect.gen(function*(_) {
        const exists = yield* _(fileExists(fs, config.sshdConfigPath))
        const current = exists ? yield* _(fs.readFileString(config.sshdConfigPath)) : ""
        const next = renderSshdConfig(current, config)
        if (next === current) {
          return `${config.sshdConfigPath} already up to date`
        }
        yield* _(fs.makeDirectory(path.dirname(config.sshdConfigPath), { recursive: true }))
        yield* _(fs.writeFileString(config.sshdConfigPath, next))
        return `${sshdDirectivesFor(config).length} directives applied to ${config.sshdConfigPath}`
      })
    )
  )
