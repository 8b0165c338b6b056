/**
 * Stamped at build time by the embedding application, usually from
 * environment variables or a generated file. Every field is optional.
 */
export type BuildInfo = Readonly<{
  commit?: string
  date?: string
  number?: string
  runtimeVersion?: string
}>

const UNSET = "<unset>"

export function formatVersion(info: BuildInfo): string {
  const lines: [string, string | undefined][] = [
    ["BuildCommit", info.commit],
    ["BuildDate", info.date],
    ["BuildNumber", info.number],
    ["BuildRuntime", info.runtimeVersion],
  ]

  return lines.map(([label, value]) => `${label}: ${value || UNSET}\n`).join("")
}

export function currentBuildInfo(env: Record<string, string | undefined> = process.env): BuildInfo {
  return {
    commit: env.BUILD_COMMIT,
    date: env.BUILD_DATE,
    number: env.BUILD_NUMBER,
    runtimeVersion: process.version,
  }
}
