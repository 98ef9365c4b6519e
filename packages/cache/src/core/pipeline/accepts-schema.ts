import type { ZodType } from "zod"

/**
 * Builds a read-through `accepts` guard from a zod schema.
 *
 * @example
 * ```ts
 * readThrough: { kind: "read-through", cacheNames: ["users"], accepts: acceptsSchema(userSchema) }
 * ```
 */
export function acceptsSchema<T>(schema: ZodType<T>): (value: unknown) => value is T {
  return (value): value is T => schema.safeParse(value).success
}
