/**
 * Request Tracing Middleware
 *
 * Wraps an HTTP app so that every request runs inside one server span,
 * continuing the upstream trace named by the W3C traceparent header.
 */

import type { HttpApp, HttpServerResponse } from "@effect/platform"
import { HttpServerRequest } from "@effect/platform"
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_HTTP_ROUTE,
  ATTR_URL_PATH
} from "@opentelemetry/semantic-conventions"
import { Context, Effect, Option } from "effect"
import type { Tracer } from "effect"
import { parseTraceparent, toExternalSpan, TRACEPARENT_HEADER } from "./traceparent.js"

/**
 * What to do with a request that carries no usable traceparent header.
 *
 * - `"noop"`: the request is not traced; spans opened by the handler are no-ops.
 * - `"root"`: the request span starts a fresh trace.
 */
export type FallbackPolicy = "noop" | "root"

export interface TraceMiddlewareOptions {
  readonly fallback?: FallbackPolicy
  /**
   * Low-cardinality route template for the request (e.g. `/users/:id`).
   * The literal URL path is used when this is absent or returns `undefined`.
   */
  readonly route?: (request: HttpServerRequest.HttpServerRequest) => string | undefined
}

/**
 * Marks a fiber as already running inside a request span opened by this
 * middleware, so a second application nests instead of decoding the header again.
 */
class RequestSpan extends Context.Tag("@http-tracing/tracing/RequestSpan")<
  RequestSpan,
  { readonly name: string }
>() {}

// scheme "://" authority, e.g. http://example.com/ping
const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\//i

/**
 * URL path of a request target, without query string or fragment.
 * Origin-form targets are cut as-is; dot segments and repeated slashes are kept.
 */
export const requestPath = (url: string): string => {
  if (ABSOLUTE_FORM.test(url)) {
    return Option.liftThrowable(() => new URL(url).pathname)().pipe(
      Option.getOrElse(() => url)
    )
  }
  const end = url.search(/[?#]/)
  return end === -1 ? url : url.slice(0, end)
}

/**
 * Wraps an HTTP app with per-request tracing.
 *
 * The wrapped app behaves exactly like `app`: the request is passed through
 * untouched and the response or failure comes back unchanged. A successful
 * response's status is recorded on the request span before it is returned.
 *
 * @example
 * ```ts
 * const router = HttpRouter.empty.pipe(
 *   HttpRouter.get("/ping", Effect.succeed(HttpServerResponse.text("pong")))
 * )
 *
 * const app = router.pipe(withRequestTracing({ fallback: "root" }))
 * ```
 */
export const withRequestTracing = (options: TraceMiddlewareOptions = {}) => {
  const fallback = options.fallback ?? "noop"

  return <E, R>(
    app: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>
  ): HttpApp.Default<E, R> =>
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest
      const enclosing = yield* Effect.serviceOption(RequestSpan)

      const path = requestPath(request.url)
      const route = options.route?.(request) ?? path
      const name = `${request.method} ${route}`

      const spanOptions: Tracer.SpanOptions = {
        kind: "server",
        attributes: {
          [ATTR_HTTP_REQUEST_METHOD]: request.method,
          [ATTR_URL_PATH]: path,
          [ATTR_HTTP_ROUTE]: route
        }
      }

      const traced = app.pipe(
        Effect.tap((response) =>
          Effect.annotateCurrentSpan(ATTR_HTTP_RESPONSE_STATUS_CODE, String(response.status))
        ),
        Effect.provideService(RequestSpan, { name })
      )

      // Wrapped twice: the enclosing request span is the parent
      if (Option.isSome(enclosing)) {
        return yield* Effect.withSpan(traced, name, spanOptions)
      }

      const parent = parseTraceparent(request.headers[TRACEPARENT_HEADER])
      if (parent !== undefined) {
        return yield* Effect.withSpan(traced, name, {
          ...spanOptions,
          parent: toExternalSpan(parent)
        })
      }

      if (fallback === "root") {
        return yield* Effect.withSpan(traced, name, { ...spanOptions, root: true })
      }

      return yield* app.pipe(
        Effect.provideService(RequestSpan, { name }),
        Effect.withTracerEnabled(false)
      )
    })
}

/** Request tracing with the default options (`noop` fallback, path as route). */
export const traceMiddleware = withRequestTracing()
