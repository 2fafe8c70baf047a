import { Schema } from "effect"

// Letters, digits, "-" and "_", at most 64 characters
export const GreetingName = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z0-9_-]{1,64}$/)
)
export type GreetingName = typeof GreetingName.Type

export const GreetParams = Schema.Struct({
  name: GreetingName
})

// Names the service refuses to greet (compared case-insensitively)
export const RESERVED_NAMES: ReadonlySet<string> = new Set(["admin", "root"])

export const isReservedName = (name: string): boolean =>
  RESERVED_NAMES.has(name.toLowerCase())
