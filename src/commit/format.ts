import { isCommitType } from "./types"

export const PROGRAM_NAME = "gitorade"

/**
 * Prefix a commit message with its type tag, e.g. `[feat]: add retry logic`.
 *
 * The message is passed through verbatim. Unknown tags leave it untouched,
 * and an empty message stays empty whatever the tag.
 */
export function formatMessage(message?: string, commitType?: string): string {
  if (!message) return ""
  if (isCommitType(commitType)) {
    return `[${commitType}]: ${message}`
  }
  return message
}

export function isShorthand(message?: string): boolean {
  if (!message) return false
  return tokenize(message)[0] === PROGRAM_NAME
}

/**
 * Expand a message written as `gitorade <type> <word>`.
 *
 * Three tokens with a known tag in the middle become `[type]: word`; any other
 * shape drops the leading program name and rejoins the rest with single spaces.
 */
export function formatShorthand(message: string): string {
  const tokens = tokenize(message)
  const [, tag, subject] = tokens
  if (tokens.length === 3 && isCommitType(tag)) {
    return `[${tag}]: ${subject}`
  }
  return tokens.slice(1).join(" ")
}

function tokenize(message: string): string[] {
  return message.split(/\s+/).filter(Boolean)
}
