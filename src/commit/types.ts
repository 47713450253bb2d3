import { z } from "zod"

// --- Commit types: conventional-commit style tags ---

export const COMMIT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "chore",
  "revert",
  "build",
  "ci",
  "release",
  "other",
] as const

export const commitTypeSchema = z.enum(COMMIT_TYPES)

export type CommitType = z.infer<typeof commitTypeSchema>

export function isCommitType(value: string | undefined): value is CommitType {
  return commitTypeSchema.safeParse(value).success
}
