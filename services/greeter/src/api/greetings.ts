import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { GreetParams } from "../domain/Greeting.js"
import { GreetingService } from "../services/GreetingService.js"

// GET /greet/:name - Greet a caller by name
export const greet = Effect.gen(function* () {
  const service = yield* GreetingService
  const { name } = yield* HttpRouter.schemaPathParams(GreetParams)

  const message = yield* service.greet(name)

  return yield* HttpServerResponse.json({ message })
}).pipe(
  Effect.catchTags({
    ParseError: () =>
      HttpServerResponse.json(
        {
          error: "validation_error",
          message: "Invalid name. Use 1-64 letters, digits, '-' or '_'."
        },
        { status: 400 }
      ),
    ReservedNameError: (error) =>
      HttpServerResponse.json(
        { error: "reserved_name", message: `The name ${error.name} is reserved` },
        { status: 403 }
      )
  })
)
