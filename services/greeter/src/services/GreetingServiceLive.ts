import { Effect, Layer } from "effect"
import { GreetingService } from "./GreetingService.js"
import { isReservedName, type GreetingName } from "../domain/Greeting.js"
import { ReservedNameError } from "../domain/errors.js"

export const GreetingServiceLive = Layer.succeed(GreetingService, {
  greet: (name: GreetingName) =>
    Effect.gen(function* () {
      if (isReservedName(name)) {
        yield* Effect.logWarning("Refusing to greet reserved name", { name })
        return yield* Effect.fail(new ReservedNameError({ name }))
      }

      yield* Effect.logDebug("Composing greeting", { name })
      return `Hello, ${name}!`
    }).pipe(
      Effect.withSpan("compose-greeting", {
        attributes: { "greeting.name": name }
      })
    )
})
