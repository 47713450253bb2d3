import chalk from "chalk"

// Diagnostics go to stderr; stdout carries only what the user asked for.
export const logger = {
  error(...args: unknown[]) {
    console.error(chalk.red(...args))
  },
  warn(...args: unknown[]) {
    console.error(chalk.yellow(...args))
  },
}
