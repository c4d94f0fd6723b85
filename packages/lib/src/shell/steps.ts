import { type PlatformError, TypeId as PlatformErrorTypeId } from "@effect/platform/Error"
import { Effect, Match, Predicate } from "effect"

import { failed, renderOutcome, skipped, type StepOutcome, succeeded } from "../core/outcome.js"
import { CommandFailedError, OwnershipNotAppliedError, UnknownTimezoneError } from "./errors.js"

const isPlatformError = (error: unknown): error is PlatformError =>
  Predicate.hasProperty(error, PlatformErrorTypeId)

// FileSystem.copyFile NotFound (/etc/ssh/ssh_host_rsa_key): ENOENT ...
const describePlatformError = (error: PlatformError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "SystemError" }, ({ description, method, module, pathOrDescriptor, reason }) =>
      [
        `${module}.${method} ${reason}`,
        pathOrDescriptor === undefined ? "" : ` (${pathOrDescriptor})`,
        description === undefined ? "" : `: ${description}`
      ].join("")),
    Match.when({ _tag: "BadArgument" }, ({ description, method, module }) =>
      [
        `${module}.${method} bad argument`,
        description === undefined ? "" : `: ${description}`
      ].join("")),
    Match.exhaustive
  )

export const describeError = (error: unknown): string => {
  if (isPlatformError(error)) {
    return describePlatformError(error)
  }
  if (error instanceof CommandFailedError) {
    return `${error.command} failed with exit code ${error.exitCode}`
  }
  if (error instanceof OwnershipNotAppliedError) {
    return `${error.path} is still owned by ${error.actual} after chown (running without root?)`
  }
  if (error instanceof UnknownTimezoneError) {
    return `unknown timezone ${error.timezone} (no ${error.zoneinfoPath})`
  }
  if (error instanceof Error && error.message.length > 0) {
    return error.message
  }
  return String(error)
}

export const logOutcome = (outcome: StepOutcome): Effect.Effect<void> =>
  Match.value(outcome).pipe(
    Match.when({ _tag: "Failed" }, (value) => Effect.logWarning(renderOutcome(value))),
    Match.orElse((value) => Effect.log(renderOutcome(value)))
  )

// CHANGE: turn a fallible step into a logged outcome value
// PURITY: SHELL
// EFFECT: Effect<StepOutcome, never, R>
// INVARIANT: typed failures become Failed outcomes and never reach the caller's error channel
// COMPLEXITY: O(step)
export const attemptStep = <E, R>(
  step: string,
  effect: Effect.Effect<string, E, R>
): Effect.Effect<StepOutcome, never, R> =>
  effect.pipe(
    Effect.map((detail) => succeeded(step, detail)),
    Effect.catchAll((error) => Effect.succeed(failed(step, describeError(error)))),
    Effect.tap(logOutcome)
  )

export const skipStep = (step: string, reason: string): Effect.Effect<StepOutcome> => {
  const outcome = skipped(step, reason)
  return Effect.as(logOutcome(outcome), outcome)
}
