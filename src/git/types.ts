// --- Git types ---

export interface GitBinary {
  readonly path: string
  readonly version: string
}

export interface CommitRequest {
  readonly message: string
  readonly files: readonly string[]
  /** Anything outside the known tags is ignored rather than rejected. */
  readonly commitType?: string
  readonly cwd: string
  readonly configOverrides: Readonly<Record<string, string>>
}

export interface CommitResult {
  exitCode: number
  /** stdout and stderr, merged in write order */
  output: string
}

export interface RunOptions {
  cwd?: string
  /** Aborting kills the child; the run still resolves once it has exited. */
  signal?: AbortSignal
}

export interface RunResult {
  exitCode: number
  stdout: string
  all: string
}

/** Runs an executable to completion and reports what it printed. */
export type GitRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<RunResult>

/** Looks a command name up on the search path; null when nothing matches. */
export type ExecutableResolver = (name: string) => Promise<string | null>
