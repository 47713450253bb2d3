// --- Debug mode: timestamped verbose logging on stderr ---

import chalk from "chalk"

let debugEnabled = false

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

export function isDebug(): boolean {
  return debugEnabled
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23) // HH:mm:ss.SSS
}

export const debug = {
  log(...args: unknown[]): void {
    if (!debugEnabled) return
    console.error(chalk.dim(`[${timestamp()}]`), ...args)
  },

  step(step: number, message: string): void {
    if (!debugEnabled) return
    console.error(chalk.dim(`[${timestamp()}]`), chalk.blue(`[step ${step}]`), message)
  },

  spawn(file: string, args: readonly string[], cwd?: string): void {
    if (!debugEnabled) return
    const where = cwd ? chalk.dim(` (in ${cwd})`) : ""
    console.error(
      chalk.dim(`[${timestamp()}]`),
      chalk.magenta(`[spawn]`),
      `${file} ${args.join(" ")}${where}`
    )
  },

  exit(file: string, exitCode: number): void {
    if (!debugEnabled) return
    const color = exitCode === 0 ? chalk.green : chalk.yellow
    console.error(chalk.dim(`[${timestamp()}]`), color(`[exit]`), `${file} → ${exitCode}`)
  },
}
