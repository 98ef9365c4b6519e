import { describeKey } from "./describe-key"
import { type Fingerprintable, keyFingerprint } from "./key-fingerprint"

/**
 * Composite key over all positional and named arguments of a call.
 *
 * Two keys are equal when their arguments are value-equal; named
 * arguments compare regardless of the order they were given in.
 */
export class SimpleKey implements Fingerprintable {
  /** Key for calls without arguments. */
  static readonly EMPTY = new SimpleKey([], {})

  readonly positional: readonly unknown[]
  readonly named: Readonly<Record<string, unknown>>
  private cachedFingerprint: string | undefined

  constructor(positional: readonly unknown[], named: Readonly<Record<string, unknown>> = {}) {
    this.positional = Object.freeze([...positional])
    this.named = Object.freeze({ ...named })
  }

  fingerprint(): string {
    this.cachedFingerprint ??= `SimpleKey(${keyFingerprint(this.positional)}|${keyFingerprint(this.named)})`

    return this.cachedFingerprint
  }

  equals(other: unknown): boolean {
    return other instanceof SimpleKey && other.fingerprint() === this.fingerprint()
  }

  toString(): string {
    const parts = [
      ...this.positional.map(describeKey),
      ...Object.entries(this.named).map(([name, value]) => `${name}: ${describeKey(value)}`),
    ]

    return `SimpleKey(${parts.join(", ")})`
  }
}
