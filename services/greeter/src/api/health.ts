import { HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { GreeterConfig } from "../config.js"

// Exported for testing - the core health check logic
export const healthCheck = Effect.gen(function* () {
  const config = yield* GreeterConfig

  return yield* HttpServerResponse.json({
    status: "healthy",
    service: config.serviceName,
    uptime_ms: Math.round(process.uptime() * 1000),
    timestamp: new Date().toISOString()
  })
})
