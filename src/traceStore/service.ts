/**
 * TraceRegistry Effect Service
 *
 * An Effect service wrapping the pure transitions from transitions.ts with
 * Ref-based atomic state management and PubSub event publishing.
 *
 * Mutations:  Ref.modify (atomic) -> log + write finished lines -> publish events
 * Queries:    Ref.get (read-only snapshot) -> Effect.map
 *
 * Sink writes happen after Ref.modify returns, so a slow sink never holds
 * up event ingestion.
 */

import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Context from "effect/Context"
import * as Ref from "effect/Ref"
import * as PubSub from "effect/PubSub"
import type * as Option from "effect/Option"
import { pipe } from "effect/Function"
import type { LogEvent } from "../logEvent"
import { CrunchConfig } from "../config"
import { OutputSink } from "../outputSink"
import type { RegistryState, RegistryEvent, TraceView } from "./types"
import { empty } from "./types"
import {
  addEvent as addEventTransition,
  sweep as sweepTransition,
  finishedLines,
  activeTrace,
} from "./transitions"

// =============================================================================
// Service Definition
// =============================================================================

export class TraceRegistry extends Context.Tag("trace-crunch/TraceRegistry")<TraceRegistry, {
  readonly add: (event: LogEvent) => Effect.Effect<void>
  /** Returns the lines written for the traces this sweep finalized */
  readonly sweep: (force: boolean) => Effect.Effect<ReadonlyArray<string>>
  /** Finalize every active trace */
  readonly stop: () => Effect.Effect<ReadonlyArray<string>>
  readonly getTrace: (traceId: string) => Effect.Effect<Option.Option<TraceView>>
  readonly snapshot: () => Effect.Effect<RegistryState>
  readonly events: PubSub.PubSub<RegistryEvent>
}>() {}

// =============================================================================
// Helpers
// =============================================================================

/** Publish an array of events to a PubSub, discarding results */
const publishAll = (
  pubsub: PubSub.PubSub<RegistryEvent>,
  events: ReadonlyArray<RegistryEvent>,
): Effect.Effect<void> =>
  Effect.forEach(events, (event) => PubSub.publish(pubsub, event), { discard: true })

const logRegistryEvent = (event: RegistryEvent): Effect.Effect<void> => {
  switch (event._tag) {
    case "TraceStarted":
      return Effect.logDebug("Trace started").pipe(Effect.annotateLogs("traceId", event.traceId))
    case "TraceUpdated":
      return Effect.void
    case "EventDropped":
      return Effect.logDebug("Dropped event for finished trace").pipe(
        Effect.annotateLogs("traceId", event.traceId),
      )
    case "TraceFinalized":
      return Effect.logDebug("Trace finalized").pipe(Effect.annotateLogs("traceId", event.traceId))
    case "AnomalyDetected":
      return Effect.logWarning(`Skipping trace during sweep: ${event.reason}`).pipe(
        Effect.annotateLogs("traceId", event.traceId),
      )
  }
}

// =============================================================================
// Live Layer
// =============================================================================

export const TraceRegistryLive: Layer.Layer<TraceRegistry, never, CrunchConfig | OutputSink> = Layer.effect(
  TraceRegistry,
  Effect.gen(function* () {
    const { idleCredits } = yield* CrunchConfig
    const sink = yield* OutputSink
    const ref = yield* Ref.make(empty)
    const pubsub = yield* PubSub.unbounded<RegistryEvent>()

    const writeLine = (line: string): Effect.Effect<void> =>
      sink.write(line).pipe(
        Effect.catchAll((error) =>
          Effect.logError("Failed to write trace summary").pipe(
            Effect.annotateLogs({ line, cause: String(error.cause) }),
          ),
        ),
      )

    const add = (event: LogEvent): Effect.Effect<void> =>
      Effect.gen(function* () {
        const events = yield* Ref.modify(ref, (state) => {
          const [newState, registryEvents] = addEventTransition(event, idleCredits)(state)
          return [registryEvents, newState]
        })
        yield* Effect.forEach(events, logRegistryEvent, { discard: true })
        yield* publishAll(pubsub, events)
      })

    const sweep = (force: boolean): Effect.Effect<ReadonlyArray<string>> =>
      Effect.gen(function* () {
        const events = yield* Ref.modify(ref, (state) => {
          const [newState, registryEvents] = sweepTransition(force)(state)
          return [registryEvents, newState]
        })
        yield* Effect.forEach(events, logRegistryEvent, { discard: true })

        const lines = finishedLines(events)
        yield* Effect.forEach(lines, writeLine, { discard: true })
        yield* publishAll(pubsub, events)
        return lines
      })

    const stop = (): Effect.Effect<ReadonlyArray<string>> => sweep(true)

    const getTrace = (traceId: string): Effect.Effect<Option.Option<TraceView>> =>
      pipe(
        Ref.get(ref),
        Effect.map((state) => activeTrace(state, traceId)),
      )

    const snapshot = (): Effect.Effect<RegistryState> => Ref.get(ref)

    return {
      add,
      sweep,
      stop,
      getTrace,
      snapshot,
      events: pubsub,
    }
  }),
)
