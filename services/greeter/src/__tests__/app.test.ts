import { describe, it, expect } from "vitest"
import { HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Layer, LogLevel, Option } from "effect"
import type { Tracer } from "effect"
import { makeApp, matchesRoute, resolveRoute } from "../app.js"
import { GreeterConfig } from "../config.js"
import { GreetingService } from "../services/GreetingService.js"
import { GreetingServiceLive } from "../services/GreetingServiceLive.js"

const TRACEPARENT = "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01"

const TestConfig = Layer.succeed(GreeterConfig, {
  port: 3000,
  tracingFallback: "noop",
  logLevel: LogLevel.Info,
  serviceName: "test-greeter",
  otlpEndpoint: "http://localhost:4318"
})

const makeRequest = (path: string, headers: Record<string, string> = {}) =>
  HttpServerRequest.fromWeb(new Request(`http://localhost${path}`, { headers }))

const handle = (
  request: HttpServerRequest.HttpServerRequest,
  greetingService: Layer.Layer<GreetingService> = GreetingServiceLive
) =>
  makeApp("noop").pipe(
    Effect.provideService(HttpServerRequest.HttpServerRequest, request),
    Effect.provide(Layer.mergeAll(TestConfig, greetingService)),
    Effect.runPromise
  )

const readJson = (response: HttpServerResponse.HttpServerResponse): Promise<unknown> =>
  HttpServerResponse.toWeb(response).json()

describe("greeter app", () => {
  describe("GET /ping", () => {
    it("should answer pong", async () => {
      const response = await handle(makeRequest("/ping"))

      expect(response.status).toBe(200)
      expect(await HttpServerResponse.toWeb(response).text()).toBe("pong")
    })
  })

  describe("GET /greet/:name", () => {
    it("should greet a valid name", async () => {
      const response = await handle(makeRequest("/greet/alice"))

      expect(response.status).toBe(200)
      expect(await readJson(response)).toEqual({ message: "Hello, alice!" })
    })

    it("should return 400 for an invalid name", async () => {
      const response = await handle(makeRequest("/greet/bad.name"))

      expect(response.status).toBe(400)
      expect(await readJson(response)).toEqual({
        error: "validation_error",
        message: "Invalid name. Use 1-64 letters, digits, '-' or '_'."
      })
    })

    it("should return 403 for a reserved name", async () => {
      const response = await handle(makeRequest("/greet/admin"))

      expect(response.status).toBe(403)
      expect(await readJson(response)).toEqual({
        error: "reserved_name",
        message: "The name admin is reserved"
      })
    })

    it("should run the handler inside the request span", async () => {
      const seen: Array<Tracer.Span> = []
      const RecordingGreetingService = Layer.succeed(GreetingService, {
        greet: (name) =>
          Effect.gen(function* () {
            const span = yield* Effect.option(Effect.currentSpan)
            if (Option.isSome(span)) {
              seen.push(span.value)
            }
            return `Hi ${name}`
          })
      })

      const response = await handle(
        makeRequest("/greet/alice", { traceparent: TRACEPARENT }),
        RecordingGreetingService
      )

      expect(response.status).toBe(200)
      expect(seen).toHaveLength(1)
      const span = seen[0]
      expect(span.name).toBe("GET /greet/:name")
      expect(span.traceId).toBe("0af7651916cd43dd8448eb211c80319c")
      expect(span.attributes.get("url.path")).toBe("/greet/alice")
      expect(span.attributes.get("http.route")).toBe("/greet/:name")
      expect(span.attributes.get("http.response.status_code")).toBe("200")
    })
  })

  describe("GET /health", () => {
    it("should report the configured service name", async () => {
      const response = await handle(makeRequest("/health"))

      expect(response.status).toBe(200)
      const body = await readJson(response)
      expect(body).toMatchObject({ status: "healthy", service: "test-greeter" })
      expect(body).toHaveProperty("uptime_ms")
      expect(body).toHaveProperty("timestamp")
    })
  })

  describe("unknown routes", () => {
    it("should answer 404 with a JSON body", async () => {
      const response = await handle(makeRequest("/missing", { traceparent: TRACEPARENT }))

      expect(response.status).toBe(404)
      expect(await readJson(response)).toEqual({
        error: "not_found",
        message: "No route matches the request"
      })
    })
  })
})

describe("resolveRoute", () => {
  it("should map concrete paths to their route template", () => {
    expect(resolveRoute(makeRequest("/greet/alice"))).toBe("/greet/:name")
    expect(resolveRoute(makeRequest("/ping?verbose=1"))).toBe("/ping")
    expect(resolveRoute(makeRequest("/"))).toBe("/")
  })

  it("should return undefined for unknown paths", () => {
    expect(resolveRoute(makeRequest("/greet/alice/extra"))).toBeUndefined()
    expect(resolveRoute(makeRequest("/missing"))).toBeUndefined()
  })
})

describe("matchesRoute", () => {
  it("should treat :params as single-segment wildcards", () => {
    expect(matchesRoute("/greet/:name", "/greet/bob")).toBe(true)
    expect(matchesRoute("/greet/:name", "/greet")).toBe(false)
    expect(matchesRoute("/greet/:name", "/greet/bob/extra")).toBe(false)
  })
})
