import type { Environment } from "../../ports/environment"

export type EnvReaderOptions = {
  prefix?: string
  env?: Environment
}

/**
 * Snapshot of the environment, optionally narrowed to the variables starting
 * with `prefix` (which is stripped from the returned keys).
 */
export function readEnvironment(options: EnvReaderOptions = {}): Environment {
  const env = options.env ?? process.env

  if (!options.prefix) return { ...env }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(options.prefix)) {
      filtered[key.slice(options.prefix.length)] = value
    }
  }

  return filtered
}
