import { HttpMiddleware, HttpServer } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { makeApp } from "./app.js"
import { GreeterConfig } from "./config.js"
import { AppLive, LoggerLive } from "./layers.js"
import { TelemetryLive } from "./telemetry.js"

// Create HTTP server with port and tracing fallback from config
const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* GreeterConfig

    yield* Effect.logInfo("Starting greeter service", {
      port: config.port,
      tracingFallback: config.tracingFallback
    })

    return makeApp(config.tracingFallback).pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      // Request spans come from withRequestTracing, not the platform's own tracer
      HttpMiddleware.withTracerDisabledWhen(() => true),
      Layer.provide(
        NodeHttpServer.layer(createServer, { port: config.port })
      )
    )
  })
)

// Compose final application layer
const MainLive = HttpLive.pipe(
  Layer.provide(AppLive),
  Layer.provide(TelemetryLive),
  Layer.provide(LoggerLive)
)

// Launch the server
Layer.launch(MainLive).pipe(NodeRuntime.runMain)
