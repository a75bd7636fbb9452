/**
 * TraceSummary
 *
 * Folds the events of one trace into boundary timestamps, a count, the
 * deepest clock, and the category of the earliest event.
 */

import type { LogEvent } from "../logEvent"
import type { TraceSummary } from "./types"

export const make = (event: LogEvent): TraceSummary => ({
  first: event.timestamp,
  last: event.timestamp,
  count: 1,
  maxDepth: event.clock.length,
  category: event.category,
})

/**
 * Fold another event in. The category follows whichever event holds the
 * minimum timestamp, so a late event with an earlier timestamp replaces it.
 */
export const add = (summary: TraceSummary, event: LogEvent): TraceSummary => {
  const earlier = event.timestamp < summary.first

  return {
    first: earlier ? event.timestamp : summary.first,
    last: Math.max(summary.last, event.timestamp),
    count: summary.count + 1,
    maxDepth: Math.max(summary.maxDepth, event.clock.length),
    category: earlier ? event.category : summary.category,
  }
}

const plural = (n: number, noun: string): string =>
  `${n} ${noun}${n === 1 ? "" : "s"}`

/** e.g. `checkout -- 42ms, 3 calls, 2 levels` */
export const render = (summary: TraceSummary): string =>
  `${summary.category} -- ${summary.last - summary.first}ms, ${plural(summary.count, "call")}, ${plural(summary.maxDepth, "level")}`
