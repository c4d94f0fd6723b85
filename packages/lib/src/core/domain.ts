export type SshdLogLevel =
  | "QUIET"
  | "FATAL"
  | "ERROR"
  | "INFO"
  | "VERBOSE"
  | "DEBUG"
  | "DEBUG1"
  | "DEBUG2"
  | "DEBUG3"

export const sshdLogLevels: ReadonlyArray<SshdLogLevel> = [
  "QUIET",
  "FATAL",
  "ERROR",
  "INFO",
  "VERBOSE",
  "DEBUG",
  "DEBUG1",
  "DEBUG2",
  "DEBUG3"
]

export interface Ownership {
  readonly uid: number
  readonly gid: number
}

export interface BackupPolicy {
  readonly pollIntervalMs: number
  readonly timeoutMs: number
}

export interface BoxConfig {
  readonly sshUsername: string
  readonly sshPassword: string
  readonly rootPassword?: string | undefined
  readonly authorizedKeys?: string | undefined
  readonly bindHost: string
  readonly bindHostname: string
  readonly timezone?: string | undefined
  readonly sshBanner?: string | undefined
  readonly logLevel: SshdLogLevel
  readonly volumePath: string
  readonly ownership: Ownership
  readonly hostKeyDir: string
  readonly hostKeyBackupDir: string
  readonly backup: BackupPolicy
  readonly sshdPath: string
  readonly sshdConfigPath: string
  readonly bannerPath: string
  readonly zoneinfoDir: string
  readonly localtimePath: string
  readonly timezonePath: string
  readonly homeRoot: string
}

export const defaultOwnership: Ownership = { uid: 1000, gid: 1000 }

export const defaultBackupPolicy: BackupPolicy = {
  pollIntervalMs: 500,
  timeoutMs: 30_000
}

export const volumeDirectories: ReadonlyArray<string> = [
  "data",
  "uploads",
  "logs",
  "agent_memory",
  "cache"
]

export interface StartCommand {
  readonly _tag: "Start"
  readonly runSshd: boolean
}

export interface HostKeysRestoreCommand {
  readonly _tag: "HostKeysRestore"
}

export interface HostKeysBackupCommand {
  readonly _tag: "HostKeysBackup"
  readonly pollIntervalMs?: number | undefined
  readonly timeoutMs?: number | undefined
}

export interface HostKeysStatusCommand {
  readonly _tag: "HostKeysStatus"
}

export interface VolumeSetupCommand {
  readonly _tag: "VolumeSetup"
}

export interface ShowConfigCommand {
  readonly _tag: "ShowConfig"
}

export interface HelpCommand {
  readonly _tag: "Help"
  readonly message: string
}

export type Command =
  | StartCommand
  | HostKeysRestoreCommand
  | HostKeysBackupCommand
  | HostKeysStatusCommand
  | VolumeSetupCommand
  | ShowConfigCommand
  | HelpCommand

export type ParseError =
  | { readonly _tag: "UnknownCommand"; readonly command: string }
  | { readonly _tag: "UnknownOption"; readonly option: string }
  | { readonly _tag: "MissingOptionValue"; readonly option: string }
  | { readonly _tag: "MissingRequiredOption"; readonly option: string }
  | { readonly _tag: "InvalidOption"; readonly option: string; readonly reason: string }
  | { readonly _tag: "UnexpectedArgument"; readonly value: string }
