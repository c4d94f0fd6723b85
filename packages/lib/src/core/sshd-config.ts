import type { BoxConfig } from "./domain.js"

export interface SshdDirective {
  readonly key: string
  readonly value: string
}

const splitLines = (input: string): Array<string> => {
  const lines = input.replace(/\r\n/g, "\n").split("\n")
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop()
  }
  return lines
}

const directiveKey = (line: string): string | null => {
  const trimmed = line.trim()
  if (trimmed.length === 0 || trimmed.startsWith("#")) {
    return null
  }
  const [key] = trimmed.split(/\s+/)
  return key === undefined ? null : key.toLowerCase()
}

// Lines from the first Match block onward are conditional and never touched.
const globalSectionEnd = (lines: ReadonlyArray<string>): number => {
  const index = lines.findIndex((line) => directiveKey(line) === "match")
  return index === -1 ? lines.length : index
}

// CHANGE: set an sshd_config directive in place instead of appending duplicates
// PURITY: CORE
// FORMAT THEOREM: forall t, d: upsert(upsert(t, d), d) = upsert(t, d)
// INVARIANT: exactly one global occurrence of d.key remains; Match blocks are preserved
// COMPLEXITY: O(n) where n = |lines|
export const upsertDirective = (text: string, directive: SshdDirective): string => {
  const lines = splitLines(text)
  const end = globalSectionEnd(lines)
  const wanted = directive.key.toLowerCase()
  const rendered = `${directive.key} ${directive.value}`
  const head: Array<string> = []
  let replaced = false

  for (const line of lines.slice(0, end)) {
    if (directiveKey(line) !== wanted) {
      head.push(line)
      continue
    }
    if (!replaced) {
      head.push(rendered)
      replaced = true
    }
  }

  if (!replaced) {
    head.push(rendered)
  }

  return [...head, ...lines.slice(end)].join("\n") + "\n"
}

export const hardeningDirectives: ReadonlyArray<SshdDirective> = [
  { key: "PermitRootLogin", value: "no" },
  { key: "MaxAuthTries", value: "3" },
  { key: "ClientAliveInterval", value: "300" },
  { key: "ClientAliveCountMax", value: "2" }
]

export const sshdDirectivesFor = (config: BoxConfig): ReadonlyArray<SshdDirective> => [
  { key: "PasswordAuthentication", value: config.authorizedKeys === undefined ? "yes" : "no" },
  ...hardeningDirectives,
  { key: "LogLevel", value: config.logLevel },
  { key: "SyslogFacility", value: "AUTH" },
  ...(config.sshBanner === undefined ? [] : [{ key: "Banner", value: config.bannerPath }])
]

export const renderSshdConfig = (text: string, config: BoxConfig): string =>
  sshdDirectivesFor(config).reduce(upsertDirective, text)
