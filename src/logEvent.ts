/**
 * Log Event Codec
 *
 * Validates raw frames from the tracing service and flattens them into the
 * fixed LogEvent record the aggregator consumes.
 * This file should have NO imports from local modules except errors.
 */

import * as Schema from "effect/Schema"
import * as Either from "effect/Either"
import * as ParseResult from "effect/ParseResult"
import { pipe } from "effect/Function"
import { EventDecodeError } from "./errors"

// =============================================================================
// Types
// =============================================================================

export interface LogEvent {
  readonly traceId: string
  readonly timestamp: number
  readonly clock: ReadonlyArray<number>
  readonly category: string
  readonly node?: string
  readonly level?: string
  readonly contentType?: string
  readonly text?: string
}

/** Keep-alive message sent upstream; a no-op for the tracing service */
export interface LogAck {
  readonly timestamp: number
}

// =============================================================================
// Wire Schemas
// =============================================================================

const Timestamp = Schema.optional(Schema.NullOr(Schema.Number.pipe(Schema.int())))

const Payload = {
  node: Schema.optional(Schema.String),
  level: Schema.optional(Schema.String),
  category: Schema.String,
  contentType: Schema.optional(Schema.String),
  text: Schema.optional(Schema.String),
}

/** The service's nested form: context.traceId, context.clock.clocks */
export const NestedWireEvent = Schema.Struct({
  context: Schema.Struct({
    traceId: Schema.String,
    clock: Schema.Struct({ clocks: Schema.Array(Schema.Number.pipe(Schema.int())) }),
    properties: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
  }),
  timestamp: Timestamp,
  ...Payload,
})

export const FlatWireEvent = Schema.Struct({
  traceId: Schema.String,
  clock: Schema.Array(Schema.Number.pipe(Schema.int())),
  timestamp: Timestamp,
  ...Payload,
})

export const WireEvent = Schema.Union(NestedWireEvent, FlatWireEvent)
export type WireEvent = typeof WireEvent.Type

// =============================================================================
// Decoding
// =============================================================================

/** Why an incoming frame was not forwarded to the registry */
export type SkipReason =
  | { readonly _tag: "MissingTimestamp"; readonly traceId: string; readonly category: string }
  | { readonly _tag: "Malformed"; readonly error: EventDecodeError }

const decodeWire = Schema.decodeUnknownEither(WireEvent)

/** Flatten a validated wire event, refusing it when the timestamp is absent */
const flatten = (wire: WireEvent): Either.Either<LogEvent, SkipReason> => {
  const { traceId, clock } = "context" in wire
    ? { traceId: wire.context.traceId, clock: wire.context.clock.clocks }
    : { traceId: wire.traceId, clock: wire.clock }

  if (wire.timestamp === undefined || wire.timestamp === null) {
    return Either.left({ _tag: "MissingTimestamp", traceId, category: wire.category })
  }

  return Either.right({
    traceId,
    timestamp: wire.timestamp,
    clock,
    category: wire.category,
    ...(wire.node !== undefined ? { node: wire.node } : {}),
    ...(wire.level !== undefined ? { level: wire.level } : {}),
    ...(wire.contentType !== undefined ? { contentType: wire.contentType } : {}),
    ...(wire.text !== undefined ? { text: wire.text } : {}),
  })
}

/**
 * Decode a raw frame into a LogEvent.
 * Only timestamp presence is checked beyond the shape the aggregator needs.
 */
export const toLogEvent = (raw: unknown): Either.Either<LogEvent, SkipReason> =>
  pipe(
    decodeWire(raw),
    Either.mapLeft((error): SkipReason => ({
      _tag: "Malformed",
      error: new EventDecodeError({ message: ParseResult.TreeFormatter.formatErrorSync(error) }),
    })),
    Either.flatMap(flatten),
  )

/** One-line description of a skipped frame for diagnostics */
export const describeSkip = (reason: SkipReason): string => {
  switch (reason._tag) {
    case "MissingTimestamp":
      return `Skip ${reason.traceId} (${reason.category}): no timestamp`
    case "Malformed":
      return `Skip malformed event: ${reason.error.message}`
  }
}
