/**
 * Deterministic JSON rendering of statement arguments.
 *
 * Object keys are sorted so identical arguments always log identically.
 * Values JSON cannot carry are rendered as strings: `bigint` in decimal,
 * `Date` as ISO 8601, `Buffer` as base64.
 *
 * @param value - A statement argument, or any nesting of them
 * @returns Canonical JSON string with sorted keys
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(toLoggable(value))
}

/** Convert a value into its JSON-safe, key-sorted form. */
export function toLoggable(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null
  }

  if (typeof value === 'bigint') {
    return value.toString()
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (Buffer.isBuffer(value)) {
    return value.toString('base64')
  }

  if (Array.isArray(value)) {
    return value.map((el) => toLoggable(el))
  }

  if (typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (v !== undefined) out[k] = toLoggable(v)
    }
    return out
  }

  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value)
  }

  return value
}
