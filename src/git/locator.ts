import { debug } from "@/src/observability"
import { GitNotFoundError, UnsupportedGitVersionError } from "@/src/utils/errors"
import { createPathResolver } from "./resolve-executable"
import { execaRunner } from "./runner"
import type { ExecutableResolver, GitBinary, GitRunner } from "./types"

export const GIT_VERSION_MIN = "2.0.0"
export const GIT_VERSION_MAX = "3.0.0"

export interface GitLocatorOptions {
  resolve?: ExecutableResolver
  run?: GitRunner
  min?: string
  max?: string
}

// --- Git Locator: find git on the search path and check its version ---

export class GitLocator {
  private readonly resolve: ExecutableResolver
  private readonly run: GitRunner
  private readonly min: string
  private readonly max: string
  private cached: Promise<GitBinary> | null = null

  constructor(options: GitLocatorOptions = {}) {
    this.resolve = options.resolve ?? createPathResolver()
    this.run = options.run ?? execaRunner
    this.min = options.min ?? GIT_VERSION_MIN
    this.max = options.max ?? GIT_VERSION_MAX
  }

  /**
   * Locate git once and hand back the same binary on every later call.
   * A failed lookup is not remembered.
   */
  locate(): Promise<GitBinary> {
    if (!this.cached) {
      this.cached = this.discover().catch((error: unknown) => {
        this.cached = null
        throw error
      })
    }
    return this.cached
  }

  /** Drop the cached binary and look it up again. */
  refresh(): Promise<GitBinary> {
    this.cached = null
    return this.locate()
  }

  private async discover(): Promise<GitBinary> {
    const gitPath = await this.resolve("git")
    if (!gitPath) {
      throw new GitNotFoundError("no git executable on the search path")
    }
    debug.log(`found git at ${gitPath}`)

    debug.spawn(gitPath, ["--version"])
    const result = await this.run(gitPath, ["--version"])
    debug.exit(gitPath, result.exitCode)
    if (result.exitCode !== 0) {
      throw new GitNotFoundError(`${gitPath} --version exited with code ${result.exitCode}`)
    }

    // "git version 2.30.0" → "2.30.0"
    const version = result.stdout.trim().split(/\s+/)[2]
    if (!version || !parseVersion(version)) {
      throw new GitNotFoundError(`could not read a version from "${result.stdout.trim()}"`)
    }

    if (!isVersionInRange(version, this.min, this.max)) {
      throw new UnsupportedGitVersionError(version, this.min, this.max)
    }

    return Object.freeze({ path: gitPath, version })
  }
}

/**
 * Leading numeric components of a version token: "2.40.0.windows.1" → [2, 40, 0].
 * Returns null when the token does not start with a number.
 */
export function parseVersion(version: string): number[] | null {
  const parts: number[] = []
  for (const part of version.split(".")) {
    if (!/^\d+$/.test(part)) break
    parts.push(Number(part))
  }
  return parts.length ? parts : null
}

/** Component-wise comparison; missing components count as zero. */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a) ?? []
  const right = parseVersion(b) ?? []
  const length = Math.max(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return Math.sign(diff)
  }
  return 0
}

/** True when `min <= version < max`. */
export function isVersionInRange(version: string, min: string, max: string): boolean {
  return compareVersions(version, min) >= 0 && compareVersions(version, max) < 0
}
