/**
 * W3C Trace Context `traceparent` codec.
 *
 * Wire format: `{version}-{trace-id}-{parent-id}-{trace-flags}`, e.g.
 * `00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01`.
 */

import { Tracer } from "effect"

/** Request header carrying the upstream trace context. */
export const TRACEPARENT_HEADER = "traceparent"

export interface TraceContext {
  readonly traceId: string
  readonly spanId: string
  readonly traceFlags: number
}

// 2 / 32 / 16 / 2 hex digits
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i

const SUPPORTED_VERSION = "00"
const INVALID_TRACE_ID = "0".repeat(32)
const INVALID_SPAN_ID = "0".repeat(16)

/**
 * Decode a `traceparent` header value.
 *
 * Anything that is not a version `00` header with non-zero ids yields
 * `undefined`; callers treat that exactly like a missing header.
 */
export const parseTraceparent = (header: string | undefined): TraceContext | undefined => {
  if (header === undefined || header.length === 0) {
    return undefined
  }

  const match = TRACEPARENT_PATTERN.exec(header)
  if (match === null) {
    return undefined
  }

  const [, version, traceId, spanId, flags] = match
  const normalizedTraceId = traceId.toLowerCase()
  const normalizedSpanId = spanId.toLowerCase()

  if (
    version !== SUPPORTED_VERSION ||
    normalizedTraceId === INVALID_TRACE_ID ||
    normalizedSpanId === INVALID_SPAN_ID
  ) {
    return undefined
  }

  return {
    traceId: normalizedTraceId,
    spanId: normalizedSpanId,
    traceFlags: parseInt(flags, 16)
  }
}

export const formatTraceparent = (ctx: TraceContext): string =>
  `${SUPPORTED_VERSION}-${ctx.traceId}-${ctx.spanId}-${ctx.traceFlags.toString(16).padStart(2, "0")}`

/** Bit 0 of the trace flags. */
export const isSampled = (traceFlags: number): boolean => (traceFlags & 0x01) === 0x01

/**
 * The decoded upstream span as a parent handle for `Effect.withSpan`.
 */
export const toExternalSpan = (ctx: TraceContext): Tracer.ExternalSpan =>
  Tracer.externalSpan({
    traceId: ctx.traceId,
    spanId: ctx.spanId,
    sampled: isSampled(ctx.traceFlags)
  })
