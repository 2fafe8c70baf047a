import { Effect, Layer, Logger } from "effect"
import { GreeterConfig, GreeterConfigLive } from "./config.js"
import { GreetingServiceLive } from "./services/GreetingServiceLive.js"

// Minimum log level from LOG_LEVEL
export const LoggerLive = Layer.unwrapEffect(
  Effect.map(GreeterConfig, (config) => Logger.minimumLogLevel(config.logLevel))
).pipe(Layer.provide(GreeterConfigLive))

// Export composed application layer
export const AppLive = Layer.mergeAll(
  GreeterConfigLive,
  GreetingServiceLive
)
