import { execa } from "execa"
import { signalExitCode } from "@/src/utils/signals"
import type { GitRunner } from "./types"

// --- Default runner: wraps execa, never throws on a non-zero exit ---

export const execaRunner: GitRunner = async (file, args, options = {}) => {
  const result = await execa(file, [...args], {
    cwd: options.cwd,
    signal: options.signal,
    all: true,
    reject: false,
    stdin: "ignore",
  })

  if (result.exitCode !== undefined) {
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      all: result.all ?? "",
    }
  }

  // Killed after it started: keep whatever it wrote.
  if (result.signal !== undefined) {
    return {
      exitCode: signalExitCode(result.signal),
      stdout: result.stdout ?? "",
      all: result.all ?? "",
    }
  }

  // Never started (ENOENT, bad cwd).
  return { exitCode: 1, stdout: "", all: `failed to run ${result.command}` }
}
