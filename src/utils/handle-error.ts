import { isDebug } from "@/src/observability"
import { GitoradeError } from "./errors"
import { logger } from "./logger"

/** Report an error on stderr and return the exit code it maps to. */
export function handleError(error: unknown): number {
  if (error instanceof GitoradeError) {
    logger.error(error.message)
    return 1
  }

  if (error instanceof Error) {
    logger.error(error.message)
    if (isDebug() && error.stack) {
      console.error(error.stack)
    }
    return 1
  }

  logger.error("Something went wrong. Please try again.")
  return 1
}
