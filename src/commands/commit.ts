import { existsSync, statSync } from "fs"
import path from "path"
import { COMMIT_TYPES, isCommitType } from "@/src/commit/types"
import { PROGRAM_NAME, formatMessage, formatShorthand, isShorthand } from "@/src/commit/format"
import { commit, type GitBinary, type GitRunner } from "@/src/git"
import { debug, setDebug } from "@/src/observability"
import { MissingArgumentError } from "@/src/utils/errors"
import { handleError } from "@/src/utils/handle-error"
import { logger } from "@/src/utils/logger"
import { Command } from "commander"

export interface CommitOptions {
  message?: string
  type?: string
  path?: string
  version?: boolean
  debug?: boolean
}

export interface CommitContext {
  locator: { locate(): Promise<GitBinary> }
  run?: GitRunner
  signal?: AbortSignal
  cwd: string
  configOverrides: Readonly<Record<string, string>>
}

/** Options whose next argument is their value, never a config override. */
export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "-m",
  "--message",
  "-t",
  "--type",
  "-p",
  "--path",
])

// --- `gitorade [files...]`: tag the message and run git commit ---

export function createCommitCommand(
  context: CommitContext,
  onExit: (exitCode: number) => void
): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description("git commit with conventional type tags on the message")
    .argument("[files...]", "files to commit (default: whatever is staged)")
    .option("-m, --message <message>", "commit message")
    .option("-t, --type <type>", `commit type: ${COMMIT_TYPES.join(", ")}`)
    .option("-p, --path <path>", "working directory", context.cwd)
    .option("-v, --version", "print the discovered git path and version", false)
    .option("-d, --debug", "print diagnostics to stderr", false)
    .addHelpText(
      "after",
      "\nGit config overrides: --core_autocrlf true is passed on as git -c core.autocrlf=true"
    )
    .action(async (files: string[], opts: CommitOptions) => {
      onExit(await runCommit(files, opts, context))
    })
}

export async function runCommit(
  files: string[],
  opts: CommitOptions,
  context: CommitContext
): Promise<number> {
  try {
    if (opts.debug) setDebug(true)

    if (opts.version) {
      const git = await context.locator.locate()
      console.log(`${git.path} (git version ${git.version})`)
      return 0
    }

    // Arguments are checked before anything is spawned.
    const cwd = resolveWorkingDirectory(opts.path, context.cwd)
    const { message, commitType } = prepareMessage(opts.message, opts.type)
    debug.step(1, `message: ${formatMessage(message, commitType)}`)

    const git = await context.locator.locate()
    debug.step(2, `git ${git.version} at ${git.path}`)

    const result = await commit(
      git,
      {
        message,
        commitType,
        files,
        cwd,
        configOverrides: context.configOverrides,
      },
      context.run,
      context.signal
    )
    debug.step(3, `git commit exited with ${result.exitCode}`)

    if (result.exitCode !== 0) {
      if (result.output) console.error(result.output)
      return result.exitCode
    }
    if (result.output) console.log(result.output)
    return 0
  } catch (error) {
    return handleError(error)
  }
}

function resolveWorkingDirectory(target: string | undefined, cwd: string): string {
  if (!target) {
    throw new MissingArgumentError("path")
  }
  const resolved = path.resolve(cwd, target)
  if (!existsSync(resolved) || !statSync(resolved).isDirectory()) {
    throw new MissingArgumentError("path", `The path ${resolved} does not exist.`)
  }
  return resolved
}

function prepareMessage(
  raw: string | undefined,
  type: string | undefined
): { message: string; commitType?: string } {
  if (raw && isShorthand(raw)) {
    const message = formatShorthand(raw)
    if (!message) throw new MissingArgumentError("message")
    return { message }
  }

  if (type && !isCommitType(type)) {
    logger.warn(`Unknown commit type "${type}", committing the message as is.`)
  }
  if (!formatMessage(raw, type)) {
    throw new MissingArgumentError("message")
  }
  return { message: raw ?? "", commitType: type }
}
