/**
 * TraceStore Transitions
 *
 * Pure functions: (State, Input) -> [NewState, ReadonlyArray<RegistryEvent>]
 *
 * No side effects, no mutation, no for loops, no mutable variables.
 * Uses pipe, Array.*, HashMap.*, HashSet.*, Option.* from Effect.
 */

import { pipe } from "effect/Function"
import * as Array from "effect/Array"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { LogEvent } from "../logEvent"
import * as Summary from "./summary"
import {
  type RegistryState,
  type RegistryEvent,
  type TraceView,
  type TraceSummary,
  RegistryEvent as RE,
} from "./types"

type Transition = readonly [RegistryState, ReadonlyArray<RegistryEvent>]

// =============================================================================
// addEvent
// =============================================================================

/**
 * Fold an event into its trace and refill the trace's idle credits.
 * Events for completed traces are dropped; a finished trace never reopens.
 * Returns curried: addEvent(event, credits)(state) -> [state, events]
 */
export const addEvent = (event: LogEvent, credits: number) =>
  (state: RegistryState): Transition => {
    const { traceId } = event

    if (HashSet.has(state.completed, traceId)) {
      return [state, [RE.EventDropped({ traceId })]] as const
    }

    const existing = HashMap.get(state.summaries, traceId)
    const summary = Option.match(existing, {
      onNone: () => Summary.make(event),
      onSome: (current) => Summary.add(current, event),
    })

    const newState: RegistryState = {
      ...state,
      summaries: HashMap.set(state.summaries, traceId, summary),
      idleCredits: HashMap.set(state.idleCredits, traceId, credits),
    }

    const registryEvent = Option.isSome(existing)
      ? RE.TraceUpdated({ traceId, count: summary.count })
      : RE.TraceStarted({ traceId })

    return [newState, [registryEvent]] as const
  }

// =============================================================================
// sweep
// =============================================================================

interface SweepAcc {
  readonly state: RegistryState
  readonly events: ReadonlyArray<RegistryEvent>
}

/** Earliest traces first, then by id, so output order is stable */
const sweepOrder = (state: RegistryState): Order.Order<string> =>
  Order.combine(
    Order.mapInput(Order.number, (traceId: string) =>
      pipe(
        HashMap.get(state.summaries, traceId),
        Option.match({ onNone: () => Number.POSITIVE_INFINITY, onSome: (s) => s.first }),
      ),
    ),
    Order.string,
  )

/** Every trace id known to either map, snapshotted before any mutation */
const activeKeys = (state: RegistryState): ReadonlyArray<string> =>
  pipe(
    HashSet.union(HashMap.keySet(state.summaries), HashMap.keySet(state.idleCredits)),
    Array.fromIterable,
    Array.sort(sweepOrder(state)),
  )

const anomaly = (acc: SweepAcc, traceId: string, reason: string): SweepAcc => ({
  ...acc,
  events: Array.append(acc.events, RE.AnomalyDetected({ traceId, reason })),
})

const finalize = (acc: SweepAcc, traceId: string, summary: TraceSummary): SweepAcc => {
  const line = `${traceId}: ${Summary.render(summary)}`
  return {
    state: {
      summaries: HashMap.remove(acc.state.summaries, traceId),
      idleCredits: HashMap.remove(acc.state.idleCredits, traceId),
      completed: HashSet.add(acc.state.completed, traceId),
    },
    events: Array.append(acc.events, RE.TraceFinalized({ traceId, line })),
  }
}

/**
 * Spend one idle credit from every active trace and finalize those that have
 * run out. With `force`, every active trace is finalized.
 * Returns curried: sweep(force)(state) -> [state, events]
 */
export const sweep = (force: boolean) =>
  (state: RegistryState): Transition => {
    const initial: SweepAcc = { state, events: [] }
    const result = Array.reduce(
      activeKeys(state),
      initial,
      (acc, traceId): SweepAcc => {
        const summary = HashMap.get(acc.state.summaries, traceId)
        const credits = HashMap.get(acc.state.idleCredits, traceId)

        if (Option.isNone(summary)) {
          return anomaly(acc, traceId, "idle credits without a summary")
        }
        if (Option.isNone(credits)) {
          return anomaly(acc, traceId, "summary without idle credits")
        }

        const remaining = credits.value - 1
        return force || remaining <= 0
          ? finalize(acc, traceId, summary.value)
          : {
              ...acc,
              state: {
                ...acc.state,
                idleCredits: HashMap.set(acc.state.idleCredits, traceId, remaining),
              },
            }
      },
    )

    return [result.state, result.events] as const
  }

// =============================================================================
// Queries
// =============================================================================

/** Lines of the traces finalized by a transition, in finalization order */
export const finishedLines = (events: ReadonlyArray<RegistryEvent>): ReadonlyArray<string> =>
  Array.filterMap(events, (event) =>
    event._tag === "TraceFinalized" ? Option.some(event.line) : Option.none(),
  )

/** Current view of one active trace */
export const activeTrace = (state: RegistryState, traceId: string): Option.Option<TraceView> =>
  pipe(
    HashMap.get(state.summaries, traceId),
    Option.map((summary) => ({
      traceId,
      summary,
      line: `${traceId}: ${Summary.render(summary)}`,
    })),
  )
