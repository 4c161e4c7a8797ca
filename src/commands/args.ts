/**
 * Minimal flag parsing for the subcommands: `--name value` pairs plus
 * positional arguments, in any order. `--` ends flag parsing.
 */

export interface ParsedArgs {
  positional: string[]
  flags: Map<string, string>
  switches: Set<string>
}

export function parseArgs(args: string[], booleanFlags: readonly string[] = []): ParsedArgs {
  const positional: string[] = []
  const flags = new Map<string, string>()
  const switches = new Set<string>()

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--') {
      positional.push(...args.slice(i + 1))
      break
    }
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }

    const name = arg.slice(2)
    const eq = name.indexOf('=')
    if (eq !== -1) {
      flags.set(name.slice(0, eq), name.slice(eq + 1))
    } else if (booleanFlags.includes(name)) {
      switches.add(name)
    } else if (i + 1 < args.length) {
      flags.set(name, args[++i])
    } else {
      throw new Error(`Missing value for --${name}`)
    }
  }

  return { positional, flags, switches }
}

export function requireFlag(parsed: ParsedArgs, name: string): string {
  const value = parsed.flags.get(name)
  if (value === undefined || value === '') {
    throw new Error(`--${name} is required`)
  }
  return value
}

export function requirePositional(parsed: ParsedArgs, index: number, label: string): string {
  const value = parsed.positional[index]
  if (value === undefined) {
    throw new Error(`<${label}> is required`)
  }
  return value
}

export function parseIntegerFlag(parsed: ParsedArgs, name: string): number | undefined {
  const raw = parsed.flags.get(name)
  if (raw === undefined) return undefined
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`--${name} must be an integer, got ${raw}`)
  }
  return Number.parseInt(raw, 10)
}

export function parseListFlag(parsed: ParsedArgs, name: string): string[] | undefined {
  const raw = parsed.flags.get(name)
  if (raw === undefined) return undefined
  return raw.split(',').map(item => item.trim()).filter(item => item.length > 0)
}
