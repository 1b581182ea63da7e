import { combineFilterConfig, flattenSegments, segmentByGap } from "./filters.ts"
import { analyzeFrequency } from "./frequency.ts"
import { analyzeTiming } from "./timing.ts"
import type { AnalysisReport, FilterOptions, KeystrokeEvent } from "./types.ts"

/**
 * Segment the batch by idle gaps, then run frequency and timing analysis over
 * the retained events. Both analyzers see the same flattened sequence.
 */
export function analyzeEvents(
  events: readonly KeystrokeEvent[],
  options?: FilterOptions,
): AnalysisReport {
  const config = combineFilterConfig(options)
  const segments = segmentByGap(events, config)
  const retained = flattenSegments(events, segments)

  return {
    totalEvents: events.length,
    segmentCount: segments.length,
    analyzedEvents: retained.length,
    frequency: analyzeFrequency(retained),
    timing: analyzeTiming(retained, config),
  }
}
