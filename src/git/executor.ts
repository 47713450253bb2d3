import { formatMessage } from "@/src/commit/format"
import { debug } from "@/src/observability"
import { execaRunner } from "./runner"
import type { CommitRequest, CommitResult, GitBinary, GitRunner } from "./types"

/**
 * Argument vector for `git commit`.
 *
 * Config overrides go ahead of the subcommand: after `commit`, git reads `-c`
 * as "reuse the message of this commit". With no files nothing follows the
 * message and git commits what is staged.
 */
export function buildCommitArgs(message: string, request: CommitRequest): string[] {
  const args: string[] = []
  for (const [key, value] of Object.entries(request.configOverrides)) {
    args.push("-c", `${key}=${value}`)
  }
  args.push("commit", "-m", message)
  if (request.files.length) {
    args.push("--", ...request.files)
  }
  return args
}

/**
 * Run `git commit` for a request. A non-zero exit is returned, never thrown;
 * the caller decides what to print and how to exit.
 */
export async function commit(
  git: GitBinary,
  request: CommitRequest,
  run: GitRunner = execaRunner,
  signal?: AbortSignal
): Promise<CommitResult> {
  const message = formatMessage(request.message, request.commitType)
  const args = buildCommitArgs(message, request)

  debug.spawn(git.path, args, request.cwd)
  const result = await run(git.path, args, { cwd: request.cwd, signal })
  debug.exit(git.path, result.exitCode)

  return { exitCode: result.exitCode, output: result.all }
}
