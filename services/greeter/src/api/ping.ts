import { HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"

// GET /ping - liveness probe; the reply runs in its own child span
export const ping = Effect.succeed(HttpServerResponse.text("pong")).pipe(
  Effect.withSpan("ping.reply")
)
