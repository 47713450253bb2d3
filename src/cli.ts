import { GitLocator, type GitBinary, type GitRunner } from "@/src/git"
import { setDebug } from "@/src/observability"
import { extractConfigOverrides } from "@/src/utils/config-overrides"
import { loadEnv } from "@/src/utils/env"
import { handleError } from "@/src/utils/handle-error"
import { CommanderError } from "commander"
import { VALUE_FLAGS, createCommitCommand } from "./commands/commit"

export interface CliDeps {
  locator?: { locate(): Promise<GitBinary> }
  run?: GitRunner
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Aborted when the process is asked to stop; git is killed and waited on. */
  signal?: AbortSignal
}

/** Parse the command line, run it, and resolve to the process exit code. */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0

  try {
    setDebug(loadEnv(deps.env).GITORADE_DEBUG)

    const { overrides, argv: rest } = extractConfigOverrides(argv, VALUE_FLAGS)
    const program = createCommitCommand(
      {
        locator: deps.locator ?? new GitLocator({ run: deps.run }),
        run: deps.run,
        signal: deps.signal,
        cwd: deps.cwd ?? process.cwd(),
        configOverrides: overrides,
      },
      (code) => {
        exitCode = code
      }
    ).exitOverride()

    await program.parseAsync(rest, { from: "user" })
  } catch (error) {
    // Commander has already printed usage errors and help.
    if (error instanceof CommanderError) return error.exitCode
    return handleError(error)
  }

  return exitCode
}
