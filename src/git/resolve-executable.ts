import { constants } from "fs"
import { access, stat } from "fs/promises"
import path from "path"
import type { ExecutableResolver } from "./types"

interface SearchPathOptions {
  searchPath?: string
  pathExt?: string
  platform?: NodeJS.Platform
}

/**
 * Build a resolver that walks the search path the way a shell does and returns
 * the first matching executable file.
 */
export function createPathResolver(options: SearchPathOptions = {}): ExecutableResolver {
  const platform = options.platform ?? process.platform
  const searchPath = options.searchPath ?? process.env.PATH ?? ""
  const extensions =
    platform === "win32"
      ? ["", ...(options.pathExt ?? process.env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").filter(Boolean)]
      : [""]
  const delimiter = platform === "win32" ? ";" : ":"

  return async (name) => {
    const dirs = searchPath.split(delimiter).filter(Boolean)
    for (const dir of dirs) {
      for (const ext of extensions) {
        const candidate = path.join(dir, name + ext)
        if (await isExecutableFile(candidate, platform)) {
          return candidate
        }
      }
    }
    return null
  }
}

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const info = await stat(candidate)
    if (!info.isFile()) return false
    // Windows has no execute bit; the extension decides.
    if (platform !== "win32") {
      await access(candidate, constants.X_OK)
    }
    return true
  } catch {
    return false
  }
}
