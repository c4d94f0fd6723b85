import { Either } from "effect"

import type { ParseError } from "@sshbox/lib/core/domain"

export interface RawOptions {
  readonly runSshd?: boolean
  readonly timeoutMs?: string
  readonly pollIntervalMs?: string
}

interface ValueOptionSpec {
  readonly flag: string
  readonly key: "timeoutMs" | "pollIntervalMs"
}

const valueOptionSpecs: ReadonlyArray<ValueOptionSpec> = [
  { flag: "--timeout-ms", key: "timeoutMs" },
  { flag: "--poll-interval-ms", key: "pollIntervalMs" }
]

const valueOptionSpecByFlag: ReadonlyMap<string, ValueOptionSpec> = new Map(
  valueOptionSpecs.map((spec) => [spec.flag, spec])
)

type ValueKey = ValueOptionSpec["key"]

const booleanFlagUpdaters: Readonly<Record<string, (raw: RawOptions) => RawOptions>> = {
  "--no-sshd": (raw) => ({ ...raw, runSshd: false })
}

const valueFlagUpdaters: { readonly [K in ValueKey]: (raw: RawOptions, value: string) => RawOptions } = {
  timeoutMs: (raw, value) => ({ ...raw, timeoutMs: value }),
  pollIntervalMs: (raw, value) => ({ ...raw, pollIntervalMs: value })
}

export const applyCommandBooleanFlag = (raw: RawOptions, token: string): RawOptions | null => {
  const updater = booleanFlagUpdaters[token]
  return updater ? updater(raw) : null
}

export const applyCommandValueFlag = (
  raw: RawOptions,
  token: string,
  value: string
): Either.Either<RawOptions, ParseError> => {
  const valueSpec = valueOptionSpecByFlag.get(token)
  if (valueSpec === undefined) {
    return Either.left({ _tag: "UnknownOption", option: token })
  }

  const update = valueFlagUpdaters[valueSpec.key]
  return Either.right(update(raw, value))
}

// CHANGE: fold argv tokens into raw option values
// PURITY: CORE
// EFFECT: Either<RawOptions, ParseError>
// INVARIANT: the first offending token is reported; later tokens are not inspected
// COMPLEXITY: O(n) where n = |args|
export const parseRawOptions = (args: ReadonlyArray<string>): Either.Either<RawOptions, ParseError> => {
  let index = 0
  let raw: RawOptions = {}

  while (index < args.length) {
    const token = args[index] ?? ""
    const booleanApplied = applyCommandBooleanFlag(raw, token)
    if (booleanApplied !== null) {
      raw = booleanApplied
      index += 1
      continue
    }

    if (!token.startsWith("-")) {
      return Either.left({ _tag: "UnexpectedArgument", value: token })
    }

    if (!valueOptionSpecByFlag.has(token)) {
      return Either.left({ _tag: "UnknownOption", option: token })
    }

    const value = args[index + 1]
    if (value === undefined) {
      return Either.left({ _tag: "MissingOptionValue", option: token })
    }

    const nextRaw = applyCommandValueFlag(raw, token, value)
    if (Either.isLeft(nextRaw)) {
      return Either.left(nextRaw.left)
    }
    raw = nextRaw.right
    index += 2
  }

  return Either.right(raw)
}

export const parsePositiveMillis = (
  option: string,
  value: string | undefined
): Either.Either<number | undefined, ParseError> => {
  if (value === undefined) {
    return Either.right(undefined)
  }
  const trimmed = value.trim()
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN
  return Number.isSafeInteger(parsed) && parsed > 0
    ? Either.right(parsed)
    : Either.left({ _tag: "InvalidOption", option, reason: `expected a positive integer, got ${value}` })
}
