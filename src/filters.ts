import { DEFAULT_FILTER_CONFIG } from "./consts.ts"
import type { FilterConfig, FilterOptions, KeystrokeEvent, TypingSegment } from "./types.ts"

export function combineFilterConfig(options?: FilterOptions): FilterConfig {
  return {
    maxGapMs: options?.maxGapMs ?? DEFAULT_FILTER_CONFIG.maxGapMs,
    minHoldMs: options?.minHoldMs ?? DEFAULT_FILTER_CONFIG.minHoldMs,
    maxHoldMs: options?.maxHoldMs ?? DEFAULT_FILTER_CONFIG.maxHoldMs,
  }
}

/**
 * Zero and negative gaps come from clock anomalies or out-of-order input and
 * are rejected along with anything at or above the session ceiling.
 */
export function isValidInterval(config: FilterConfig, gapMs: number): boolean {
  return gapMs > 0 && gapMs < config.maxGapMs
}

export function isValidHoldDuration(config: FilterConfig, durationMs: number): boolean {
  return durationMs >= config.minHoldMs && durationMs <= config.maxHoldMs
}

/**
 * Partition events into typing sessions. A new segment opens wherever the gap
 * to the previous event is strictly greater than `maxGapMs`; the returned
 * ranges cover the input exactly, in order.
 */
export function segmentByGap(
  events: readonly KeystrokeEvent[],
  config: FilterConfig,
): TypingSegment[] {
  if (events.length === 0) return []

  const segments: TypingSegment[] = []
  let start = 0

  for (let i = 1; i < events.length; i++) {
    const gap = events[i].timestamp - events[i - 1].timestamp
    if (gap > config.maxGapMs) {
      segments.push({ start, end: i })
      start = i
    }
  }

  segments.push({ start, end: events.length })
  return segments
}

export function sliceSegment(
  events: readonly KeystrokeEvent[],
  segment: TypingSegment,
): readonly KeystrokeEvent[] {
  return events.slice(segment.start, segment.end)
}

export function flattenSegments(
  events: readonly KeystrokeEvent[],
  segments: readonly TypingSegment[],
): KeystrokeEvent[] {
  const flattened: KeystrokeEvent[] = []
  for (const segment of segments) {
    for (let i = segment.start; i < segment.end; i++) {
      flattened.push(events[i])
    }
  }
  return flattened
}
