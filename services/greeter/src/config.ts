import type { FallbackPolicy } from "@http-tracing/tracing"
import { Config, Context, Effect, Layer, LogLevel } from "effect"

export class GreeterConfig extends Context.Tag("GreeterConfig")<
  GreeterConfig,
  {
    readonly port: number
    readonly tracingFallback: FallbackPolicy
    readonly logLevel: LogLevel.LogLevel
    readonly serviceName: string
    readonly otlpEndpoint: string
  }
>() {}

export const GreeterConfigLive = Layer.effect(
  GreeterConfig,
  Effect.gen(function* () {
    return {
      port: yield* Config.number("PORT").pipe(Config.withDefault(3000)),
      // Requests without a usable traceparent: "noop" leaves them untraced, "root" starts a new trace
      tracingFallback: yield* Config.literal("noop", "root")("TRACING_FALLBACK").pipe(
        Config.withDefault("noop" as const)
      ),
      logLevel: yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
      serviceName: yield* Config.string("OTEL_SERVICE_NAME").pipe(
        Config.withDefault("greeter-service")
      ),
      otlpEndpoint: yield* Config.string("OTEL_EXPORTER_OTLP_ENDPOINT").pipe(
        Config.withDefault("http://localhost:4318")
      )
    }
  })
)
