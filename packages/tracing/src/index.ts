/**
 * @http-tracing/tracing
 *
 * W3C Trace Context extraction and per-request server spans for Effect HTTP apps.
 */

// Traceparent header parsing and formatting
export {
  TRACEPARENT_HEADER,
  parseTraceparent,
  formatTraceparent,
  isSampled,
  toExternalSpan,
  type TraceContext
} from "./traceparent.js"

// Server middleware opening one span per request
export {
  withRequestTracing,
  traceMiddleware,
  requestPath,
  type FallbackPolicy,
  type TraceMiddlewareOptions
} from "./TraceMiddleware.js"
