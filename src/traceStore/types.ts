/**
 * TraceStore Types
 *
 * Immutable state and event types for the trace registry.
 * Uses Effect HashMap/HashSet for all map structures and Data.TaggedEnum for events.
 */

import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Data from "effect/Data"

// =============================================================================
// Trace Summary
// =============================================================================

export interface TraceSummary {
  /** Earliest timestamp seen */
  readonly first: number
  /** Latest timestamp seen */
  readonly last: number
  readonly count: number
  /** Longest Lamport clock seen, as a proxy for call depth */
  readonly maxDepth: number
  /** Category of the event currently holding `first` */
  readonly category: string
}

// =============================================================================
// Registry State
// =============================================================================

export interface RegistryState {
  readonly summaries: HashMap.HashMap<string, TraceSummary>
  readonly idleCredits: HashMap.HashMap<string, number>
  /** Finalized traces; membership is permanent */
  readonly completed: HashSet.HashSet<string>
}

/** A trace summary together with its rendered output line */
export interface TraceView {
  readonly traceId: string
  readonly summary: TraceSummary
  readonly line: string
}

// =============================================================================
// Registry Events (Data.TaggedEnum)
// =============================================================================

export type RegistryEvent = Data.TaggedEnum<{
  readonly TraceStarted: { readonly traceId: string }
  readonly TraceUpdated: { readonly traceId: string; readonly count: number }
  readonly EventDropped: { readonly traceId: string }
  readonly TraceFinalized: { readonly traceId: string; readonly line: string }
  readonly AnomalyDetected: { readonly traceId: string; readonly reason: string }
}>

export const RegistryEvent = Data.taggedEnum<RegistryEvent>()

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_IDLE_CREDITS = 2

// =============================================================================
// Empty State
// =============================================================================

export const empty: RegistryState = {
  summaries: HashMap.empty<string, TraceSummary>(),
  idleCredits: HashMap.empty<string, number>(),
  completed: HashSet.empty<string>(),
}
