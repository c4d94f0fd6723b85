import { Data } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly variable: string
  readonly message: string
}> {}

export class MissingCredentialsError extends Data.TaggedError("MissingCredentialsError")<{
  readonly missing: ReadonlyArray<"SSH_USERNAME" | "SSH_PASSWORD">
}> {}

export class CommandFailedError extends Data.TaggedError("CommandFailedError")<{
  readonly command: string
  readonly exitCode: number
}> {}

export class SshdExitError extends Data.TaggedError("SshdExitError")<{
  readonly sshdPath: string
  readonly exitCode: number
}> {}

export class OwnershipNotAppliedError extends Data.TaggedError("OwnershipNotAppliedError")<{
  readonly path: string
  readonly actual: string
}> {}

export class UnknownTimezoneError extends Data.TaggedError("UnknownTimezoneError")<{
  readonly timezone: string
  readonly zoneinfoPath: string
}> {}
