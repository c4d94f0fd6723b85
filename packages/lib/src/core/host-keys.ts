import { createHash } from "node:crypto"

export type HostKeyAlgorithm = "rsa" | "ecdsa" | "ed25519"

export type HostKeyRole = "private" | "public"

export interface HostKeyFile {
  readonly name: string
  readonly algorithm: HostKeyAlgorithm
  readonly role: HostKeyRole
}

export const hostKeyAlgorithms: ReadonlyArray<HostKeyAlgorithm> = ["rsa", "ecdsa", "ed25519"]

// INVARIANT: exactly one private and one public file per algorithm, private first
export const hostKeyFiles: ReadonlyArray<HostKeyFile> = hostKeyAlgorithms.flatMap((algorithm) => [
  { name: `ssh_host_${algorithm}_key`, algorithm, role: "private" as const },
  { name: `ssh_host_${algorithm}_key.pub`, algorithm, role: "public" as const }
])

export const privateKeyMode = 0o600

export const publicKeyMode = 0o644

export const modeForHostKey = (file: HostKeyFile): number =>
  file.role === "private" ? privateKeyMode : publicKeyMode

export const presentHostKeys = (names: ReadonlySet<string>): ReadonlyArray<HostKeyFile> =>
  hostKeyFiles.filter((file) => names.has(file.name))

export const missingHostKeys = (names: ReadonlySet<string>): ReadonlyArray<HostKeyFile> =>
  hostKeyFiles.filter((file) => !names.has(file.name))

export const isCompleteKeySet = (names: ReadonlySet<string>): boolean => missingHostKeys(names).length === 0

export type HostKeyPlan =
  | { readonly _tag: "EphemeralOnly" }
  | { readonly _tag: "RestoreComplete"; readonly files: ReadonlyArray<HostKeyFile> }
  | {
    readonly _tag: "RestorePartial"
    readonly files: ReadonlyArray<HostKeyFile>
    readonly missing: ReadonlyArray<HostKeyFile>
  }
  | { readonly _tag: "FirstRun" }

// CHANGE: decide between restore, partial restore and first-run capture
// PURITY: CORE
// FORMAT THEOREM: forall names: complete(names) <-> plan(true, names) = RestoreComplete
// INVARIANT: an unreachable volume never yields a restore
// COMPLEXITY: O(k) where k = |hostKeyFiles|
export const planHostKeyPersistence = (
  volumeReachable: boolean,
  durableNames: ReadonlySet<string>
): HostKeyPlan => {
  if (!volumeReachable) {
    return { _tag: "EphemeralOnly" }
  }
  const files = presentHostKeys(durableNames)
  if (files.length === 0) {
    return { _tag: "FirstRun" }
  }
  const missing = missingHostKeys(durableNames)
  return missing.length === 0
    ? { _tag: "RestoreComplete", files }
    : { _tag: "RestorePartial", files, missing }
}

export const planNeedsBackup = (plan: HostKeyPlan): boolean =>
  plan._tag === "RestorePartial" || plan._tag === "FirstRun"

export const planRestoresFiles = (plan: HostKeyPlan): ReadonlyArray<HostKeyFile> =>
  plan._tag === "RestoreComplete" || plan._tag === "RestorePartial" ? plan.files : []

export interface PublicKeyFingerprint {
  readonly keyType: string
  readonly fingerprint: string
}

const base64Pattern = /^[A-Za-z0-9+/]+={0,2}$/

// CHANGE: compute OpenSSH-style SHA256 fingerprints for host public keys
// PURITY: CORE
// INVARIANT: returns null for anything that is not "<type> <base64-blob> [comment]"
// COMPLEXITY: O(n) where n = |contents|
export const fingerprintPublicKey = (contents: string): PublicKeyFingerprint | null => {
  const firstLine = contents.split("\n").find((line) => line.trim().length > 0)
  if (firstLine === undefined) {
    return null
  }
  const [keyType, blob] = firstLine.trim().split(/\s+/)
  if (keyType === undefined || blob === undefined || !base64Pattern.test(blob)) {
    return null
  }
  const decoded = Buffer.from(blob, "base64")
  if (decoded.length === 0) {
    return null
  }
  const digest = createHash("sha256").update(decoded).digest("base64").replace(/=+$/, "")
  return { keyType, fingerprint: `SHA256:${digest}` }
}
