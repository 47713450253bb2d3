export class GitoradeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class GitNotFoundError extends GitoradeError {
  constructor(detail?: string) {
    super(detail ? `git not found: ${detail}` : "git not found")
  }
}

export class UnsupportedGitVersionError extends GitoradeError {
  constructor(
    readonly version: string,
    readonly min: string,
    readonly max: string
  ) {
    super(`git version ${version} is not supported (expected >= ${min} and < ${max})`)
  }
}

export class MissingArgumentError extends GitoradeError {
  constructor(readonly argument: string, detail?: string) {
    super(detail ?? `${argument} not specified`)
  }
}
