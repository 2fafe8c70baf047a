import { HttpRouter, HttpServerResponse } from "@effect/platform"
import type { HttpServerRequest } from "@effect/platform"
import { requestPath, withRequestTracing, type FallbackPolicy } from "@http-tracing/tracing"
import { Chunk, Effect } from "effect"
import { greet } from "./api/greetings.js"
import { healthCheck } from "./api/health.js"
import { ping } from "./api/ping.js"

export const router = HttpRouter.empty.pipe(
  HttpRouter.get("/", Effect.succeed(HttpServerResponse.text("Greeter Service"))),
  HttpRouter.get("/ping", ping),
  HttpRouter.get("/health", healthCheck),
  HttpRouter.get("/greet/:name", greet)
)

const segments = (path: string): ReadonlyArray<string> =>
  path.split("/").filter((segment) => segment.length > 0)

/**
 * Whether a router path template (`/greet/:name`) matches a concrete path.
 */
export const matchesRoute = (template: string, path: string): boolean => {
  const expected = segments(template)
  const actual = segments(path)
  return (
    expected.length === actual.length &&
    expected.every((segment, index) => segment.startsWith(":") || segment === actual[index])
  )
}

const routeTemplates = Chunk.toReadonlyArray(router.routes).map((route) => route.path)

// Route template for span names, so /greet/alice and /greet/bob share one route
export const resolveRoute = (request: HttpServerRequest.HttpServerRequest): string | undefined => {
  const path = requestPath(request.url)
  return routeTemplates.find((template) => matchesRoute(template, path))
}

/**
 * The traced HTTP app. Unknown routes are answered inside the traced scope
 * so their 404 lands on the request span.
 */
export const makeApp = (fallback: FallbackPolicy) =>
  router.pipe(
    Effect.catchTag("RouteNotFound", () =>
      HttpServerResponse.json(
        { error: "not_found", message: "No route matches the request" },
        { status: 404 }
      )
    ),
    withRequestTracing({ fallback, route: resolveRoute })
  )
