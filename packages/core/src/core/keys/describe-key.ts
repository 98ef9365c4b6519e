function hasOwnToString(value: object): boolean {
  return "toString" in value && value.toString !== Object.prototype.toString
}

/**
 * Readable rendering of a key for log lines and error messages.
 */
export function describeKey(key: unknown): string {
  if (key instanceof Date) return key.toISOString()
  if (typeof key !== "object" || key === null) return String(key)
  if (!Array.isArray(key) && hasOwnToString(key)) return String(key)

  try {
    return JSON.stringify(key) ?? String(key)
  } catch {
    return String(key)
  }
}
