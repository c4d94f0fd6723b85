import { Either, LogLevel, Match, ParseResult, Schema } from "effect"

import {
  type BoxConfig,
  defaultBackupPolicy,
  defaultOwnership,
  type SshdLogLevel
} from "./domain.js"

export type ConfigEnv = Readonly<Record<string, string | undefined>>

export interface ConfigIssue {
  readonly _tag: "ConfigIssue"
  readonly variable: string
  readonly message: string
}

export const defaultSshUsername = "myuser"
export const defaultSshPassword = "mypassword"
export const defaultBindAddress = "0.0.0.0"

const SshdLogLevelSchema = Schema.Literal(
  "QUIET",
  "FATAL",
  "ERROR",
  "INFO",
  "VERBOSE",
  "DEBUG",
  "DEBUG1",
  "DEBUG2",
  "DEBUG3"
)

const IdFromString = Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative())

const MillisFromString = Schema.NumberFromString.pipe(Schema.int(), Schema.positive())

const AbsolutePath = Schema.String.pipe(
  Schema.filter((value) => value.startsWith("/"), { message: () => "expected an absolute path" })
)

const UsernameSchema = Schema.String.pipe(
  Schema.pattern(/^[a-z_][a-z0-9_-]{0,31}$/, {
    message: () => "expected a lowercase login name (letters, digits, '_' or '-')"
  })
)

const TimezoneSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z0-9_+-]+(?:\/[A-Za-z0-9_+-]+)*$/, {
    message: () => "expected a zoneinfo name such as Europe/Berlin"
  })
)

const readValue = (env: ConfigEnv, variable: string): string | undefined => {
  const raw = env[variable]
  return raw === undefined || raw.trim().length === 0 ? undefined : raw
}

const decodeVariable = <A, I>(
  schema: Schema.Schema<A, I>,
  variable: string,
  raw: string
): Either.Either<A, ConfigIssue> =>
  Either.mapLeft(ParseResult.decodeUnknownEither(schema)(raw), (issue) => ({
    _tag: "ConfigIssue" as const,
    variable,
    message: ParseResult.TreeFormatter.formatIssueSync(issue)
  }))

const decodeOr = <A, I>(
  env: ConfigEnv,
  variable: string,
  schema: Schema.Schema<A, I>,
  fallback: A
): Either.Either<A, ConfigIssue> => {
  const raw = readValue(env, variable)
  return raw === undefined ? Either.right(fallback) : decodeVariable(schema, variable, raw.trim())
}

const decodeOptional = <A, I>(
  env: ConfigEnv,
  variable: string,
  schema: Schema.Schema<A, I>
): Either.Either<A | undefined, ConfigIssue> => {
  const raw = readValue(env, variable)
  return raw === undefined ? Either.right(undefined) : decodeVariable(schema, variable, raw.trim())
}

const resolveLogLevel = (env: ConfigEnv): Either.Either<SshdLogLevel, ConfigIssue> => {
  const raw = readValue(env, "LOG_LEVEL")
  return raw === undefined
    ? Either.right<SshdLogLevel>("INFO")
    : decodeVariable(SshdLogLevelSchema, "LOG_LEVEL", raw.trim().toUpperCase())
}

// Whitespace-only credentials resolve to "" so the start sequence can reject them.
const resolveUsername = (env: ConfigEnv): Either.Either<string, ConfigIssue> => {
  const raw = env["SSH_USERNAME"]
  if (raw === undefined || raw.length === 0) {
    return Either.right(defaultSshUsername)
  }
  const trimmed = raw.trim()
  return trimmed.length === 0 ? Either.right("") : decodeVariable(UsernameSchema, "SSH_USERNAME", trimmed)
}

// Passwords keep their surrounding whitespace unless that is all they contain.
const resolvePassword = (env: ConfigEnv): string => {
  const raw = env["SSH_PASSWORD"]
  if (raw === undefined || raw.length === 0) {
    return defaultSshPassword
  }
  return raw.trim().length === 0 ? "" : raw
}

// CHANGE: resolve every environment-derived setting once into an explicit config
// PURITY: CORE
// EFFECT: Either<BoxConfig, ConfigIssue>
// FORMAT THEOREM: forall env: resolve(env) = cfg -> cfg.hostKeyBackupDir is absolute
// INVARIANT: empty strings count as unset; the first invalid variable is reported
// COMPLEXITY: O(v) where v = |variables|
export const resolveBoxConfig = (env: ConfigEnv): Either.Either<BoxConfig, ConfigIssue> =>
  Either.gen(function*(_) {
    const sshUsername = yield* _(resolveUsername(env))
    const logLevel = yield* _(resolveLogLevel(env))
    const timezone = yield* _(decodeOptional(env, "TZ", TimezoneSchema))
    const volumePath = yield* _(
      decodeOr(env, "SSHBOX_VOLUME_PATH", AbsolutePath, `/home/${sshUsername}/code-project/WORKSPACE`)
    )
    const uid = yield* _(decodeOr(env, "SSHBOX_VOLUME_UID", IdFromString, defaultOwnership.uid))
    const gid = yield* _(decodeOr(env, "SSHBOX_VOLUME_GID", IdFromString, defaultOwnership.gid))
    const hostKeyDir = yield* _(decodeOr(env, "SSHBOX_HOST_KEY_DIR", AbsolutePath, "/etc/ssh"))
    const hostKeyBackupDir = yield* _(
      decodeOr(env, "SSHBOX_HOST_KEY_BACKUP_DIR", AbsolutePath, `${volumePath}/ssh_host_keys`)
    )
    const pollIntervalMs = yield* _(
      decodeOr(env, "SSHBOX_BACKUP_POLL_INTERVAL_MS", MillisFromString, defaultBackupPolicy.pollIntervalMs)
    )
    const timeoutMs = yield* _(
      decodeOr(env, "SSHBOX_BACKUP_TIMEOUT_MS", MillisFromString, defaultBackupPolicy.timeoutMs)
    )
    const sshdPath = yield* _(decodeOr(env, "SSHBOX_SSHD_PATH", AbsolutePath, "/usr/sbin/sshd"))
    const sshdConfigPath = yield* _(decodeOr(env, "SSHBOX_SSHD_CONFIG", AbsolutePath, "/etc/ssh/sshd_config"))

    return {
      sshUsername,
      sshPassword: resolvePassword(env),
      rootPassword: readValue(env, "ROOT_PASSWORD"),
      authorizedKeys: readValue(env, "AUTHORIZED_KEYS")?.trim(),
      bindHost: readValue(env, "HOST")?.trim() ?? defaultBindAddress,
      bindHostname: readValue(env, "HOSTNAME")?.trim() ?? defaultBindAddress,
      timezone,
      sshBanner: readValue(env, "SSH_BANNER"),
      logLevel,
      volumePath,
      ownership: { uid, gid },
      hostKeyDir,
      hostKeyBackupDir,
      backup: { pollIntervalMs, timeoutMs },
      sshdPath,
      sshdConfigPath,
      bannerPath: "/etc/ssh/banner",
      zoneinfoDir: "/usr/share/zoneinfo",
      localtimePath: "/etc/localtime",
      timezonePath: "/etc/timezone",
      homeRoot: "/home"
    }
  })

export const toEffectLogLevel = (level: SshdLogLevel): LogLevel.LogLevel =>
  Match.value(level).pipe(
    Match.when("QUIET", () => LogLevel.Error),
    Match.when("FATAL", () => LogLevel.Error),
    Match.when("ERROR", () => LogLevel.Error),
    Match.when("INFO", () => LogLevel.Info),
    Match.orElse(() => LogLevel.Debug)
  )

export const userHomeDir = (config: BoxConfig): string => `${config.homeRoot}/${config.sshUsername}`

const redacted = (value: string | undefined): string => value === undefined ? "(unset)" : "********"

const orUnset = (value: string | undefined): string => value ?? "(unset)"

// PURITY: CORE
// INVARIANT: passwords never appear in the rendered text
export const renderBoxConfig = (config: BoxConfig): string =>
  [
    `SSH_USERNAME=${config.sshUsername}`,
    `SSH_PASSWORD=${redacted(config.sshPassword)}`,
    `ROOT_PASSWORD=${redacted(config.rootPassword)}`,
    `AUTHORIZED_KEYS=${config.authorizedKeys === undefined ? "(unset)" : "(set)"}`,
    `HOST=${config.bindHost}`,
    `HOSTNAME=${config.bindHostname}`,
    `TZ=${orUnset(config.timezone)}`,
    `SSH_BANNER=${config.sshBanner === undefined ? "(unset)" : "(set)"}`,
    `LOG_LEVEL=${config.logLevel}`,
    `SSHBOX_VOLUME_PATH=${config.volumePath}`,
    `SSHBOX_VOLUME_UID=${config.ownership.uid}`,
    `SSHBOX_VOLUME_GID=${config.ownership.gid}`,
    `SSHBOX_HOST_KEY_DIR=${config.hostKeyDir}`,
    `SSHBOX_HOST_KEY_BACKUP_DIR=${config.hostKeyBackupDir}`,
    `SSHBOX_BACKUP_POLL_INTERVAL_MS=${config.backup.pollIntervalMs}`,
    `SSHBOX_BACKUP_TIMEOUT_MS=${config.backup.timeoutMs}`,
    `SSHBOX_SSHD_PATH=${config.sshdPath}`,
    `SSHBOX_SSHD_CONFIG=${config.sshdConfigPath}`
  ].join("\n")
