import { NodeSdk } from "@effect/opentelemetry"
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http"
import { BatchLogRecordProcessor } from "@opentelemetry/sdk-logs"
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-node"
import { Effect, Layer } from "effect"
import { GreeterConfig, GreeterConfigLive } from "./config.js"

// Request spans and log records exported over OTLP/HTTP
export const TelemetryLive = Layer.unwrapEffect(
  Effect.map(GreeterConfig, ({ serviceName, otlpEndpoint }) =>
    NodeSdk.layer(() => ({
      resource: {
        serviceName
      },
      spanProcessor: new BatchSpanProcessor(
        new OTLPTraceExporter({
          url: `${otlpEndpoint}/v1/traces`
        })
      ),
      logRecordProcessor: new BatchLogRecordProcessor(
        new OTLPLogExporter({
          url: `${otlpEndpoint}/v1/logs`
        })
      )
    }))
  )
).pipe(Layer.provide(GreeterConfigLive))
