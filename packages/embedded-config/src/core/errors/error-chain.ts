function getCause(v: unknown): unknown {
  return v instanceof Error ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered, outermost
 * first. Stops at `maxDepth` entries or when a cause repeats.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = getCause(current)
  }

  return chain
}

