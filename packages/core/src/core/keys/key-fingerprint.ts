/**
 * Values that define their own canonical identity for key comparison.
 */
export interface Fingerprintable {
  fingerprint(): string
}

export function isFingerprintable(value: object): value is Fingerprintable {
  return "fingerprint" in value && typeof value.fingerprint === "function"
}

const identities = new WeakMap<object, number>()
const symbolIdentities = new Map<symbol, number>()
let nextIdentity = 0

function identityOf(value: object): number {
  let id = identities.get(value)

  if (id === undefined) {
    id = ++nextIdentity
    identities.set(value, id)
  }

  return id
}

function symbolIdentityOf(value: symbol): number {
  let id = symbolIdentities.get(value)

  if (id === undefined) {
    id = ++nextIdentity
    symbolIdentities.set(value, id)
  }

  return id
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function fingerprintObject(value: object, path: Set<object>): string {
  if (path.has(value)) {
    throw new TypeError("Cannot derive a key from a cyclic structure")
  }

  path.add(value)

  try {
    if (isFingerprintable(value)) return `k:${value.fingerprint()}`
    if (value instanceof Date) return `d:${value.getTime()}`

    if (Array.isArray(value)) {
      return `a[${value.map((item: unknown) => fingerprintValue(item, path)).join(",")}]`
    }

    if (value instanceof Map) {
      const entries = [...value.entries()]
        .map(([k, v]: [unknown, unknown]) => `${fingerprintValue(k, path)}=>${fingerprintValue(v, path)}`)
        .sort()

      return `m{${entries.join(",")}}`
    }

    if (value instanceof Set) {
      const items = [...value.values()].map((item: unknown) => fingerprintValue(item, path)).sort()

      return `e{${items.join(",")}}`
    }

    if (isPlainObject(value)) {
      const fields = Object.keys(value)
        .sort()
        .map((field) => `${JSON.stringify(field)}:${fingerprintValue(Reflect.get(value, field), path)}`)

      return `o{${fields.join(",")}}`
    }

    return `i:${identityOf(value)}`
  } finally {
    path.delete(value)
  }
}

function fingerprintValue(value: unknown, path: Set<object>): string {
  switch (typeof value) {
    case "undefined":
      return "u"
    case "string":
      return `s${JSON.stringify(value)}`
    case "number":
      return `n:${Object.is(value, -0) ? 0 : value}`
    case "bigint":
      return `b:${value}`
    case "boolean":
      return `t:${value}`
    case "symbol":
      return `y:${symbolIdentityOf(value)}`
    case "function":
      return `f:${identityOf(value)}`
    default:
      return typeof value === "object" && value !== null ? fingerprintObject(value, path) : "z"
  }
}

/**
 * Canonical string for a key, so stores can index value-equal keys.
 *
 * @remarks
 * Primitives, dates, arrays, maps, sets and plain objects compare by
 * value (object fields and set/map members in any order). Values that
 * implement {@link Fingerprintable} supply their own identity. Any other
 * object compares by reference.
 *
 * @throws TypeError for cyclic structures.
 */
export function keyFingerprint(key: unknown): string {
  return fingerprintValue(key, new Set())
}

export function keysEqual(a: unknown, b: unknown): boolean {
  return keyFingerprint(a) === keyFingerprint(b)
}
