import { MissingArgumentError } from "./errors"

// --- Git config overrides passed as `--<section>_<key> <value>` ---

const OVERRIDE_FLAG = /^--([A-Za-z0-9-]+(?:_[A-Za-z0-9-]+)+)(?:=([\s\S]*))?$/

export interface ExtractedOverrides {
  overrides: Record<string, string>
  argv: string[]
}

/**
 * Pull config override flags out of an argument list. `--core_autocrlf true`
 * and `--core_autocrlf=true` both become `{ "core.autocrlf": "true" }`; the
 * remaining arguments keep their order.
 *
 * `valueFlags` names the program's own options that take a value, so that a
 * message such as `-m --not_an_override` (or `-dm --not_an_override`) is left
 * alone.
 */
export function extractConfigOverrides(
  argv: readonly string[],
  valueFlags: ReadonlySet<string> = new Set()
): ExtractedOverrides {
  const overrides: Record<string, string> = {}
  const rest: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === "--") {
      rest.push(...argv.slice(i))
      break
    }

    if (takesNextArgument(arg, valueFlags)) {
      rest.push(arg)
      if (i + 1 < argv.length) rest.push(argv[++i])
      continue
    }

    const match = OVERRIDE_FLAG.exec(arg)
    if (!match) {
      rest.push(arg)
      continue
    }

    const [, name, inline] = match
    let value = inline
    if (value === undefined) {
      if (i + 1 >= argv.length) {
        throw new MissingArgumentError(`--${name}`, `option '--${name} <value>' argument missing`)
      }
      value = argv[++i]
    }
    overrides[name.replace(/_/g, ".")] = value
  }

  return { overrides, argv: rest }
}

/** `-m`, `--message`, or a short cluster like `-dm` whose value flag comes last. */
function takesNextArgument(arg: string, valueFlags: ReadonlySet<string>): boolean {
  if (valueFlags.has(arg)) return true
  if (!/^-[A-Za-z]{2,}$/.test(arg)) return false
  for (let i = 1; i < arg.length; i++) {
    // A value flag mid-cluster takes the rest of the token as its value.
    if (valueFlags.has(`-${arg[i]}`)) return i === arg.length - 1
  }
  return false
}
