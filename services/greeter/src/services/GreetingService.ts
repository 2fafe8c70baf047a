import { Context, Effect } from "effect"
import type { GreetingName } from "../domain/Greeting.js"
import type { ReservedNameError } from "../domain/errors.js"

export class GreetingService extends Context.Tag("GreetingService")<
  GreetingService,
  {
    /**
     * Composes the greeting for a validated name.
     * Fails with ReservedNameError for reserved names.
     */
    readonly greet: (name: GreetingName) => Effect.Effect<string, ReservedNameError>
  }
>() {}
