import { Data } from "effect"

/**
 * The requested name is reserved and will not be greeted.
 */
export class ReservedNameError extends Data.TaggedError("ReservedNameError")<{
  readonly name: string
}> {}
