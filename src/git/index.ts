export { GitLocator, GIT_VERSION_MAX, GIT_VERSION_MIN, compareVersions, isVersionInRange, parseVersion } from "./locator"
export type { GitLocatorOptions } from "./locator"
export { buildCommitArgs, commit } from "./executor"
export { createPathResolver } from "./resolve-executable"
export { execaRunner } from "./runner"
export type {
  CommitRequest,
  CommitResult,
  ExecutableResolver,
  GitBinary,
  GitRunner,
  RunOptions,
  RunResult,
} from "./types"
