import { DAY_MS, DEFAULT_TOP, DEFAULT_TOP_APPLICATIONS } from "./consts.ts"
import { countKeys, takeTop, toPercentage } from "./frequency.ts"
import type { ApplicationCount, EventSummary, KeystrokeEvent } from "./types.ts"

export type SummaryOptions = {
  topKeys?: number
  topApplications?: number
}

export function summarizeEvents(
  events: readonly KeystrokeEvent[],
  options?: SummaryOptions,
): EventSummary {
  const presses = events.filter((event) => event.kind === "press")
  const pressCount = presses.length
  const dateRange = findDateRange(events)
  const daysRecorded = dateRange ? Math.max(1, Math.floor((dateRange.end - dateRange.start) / DAY_MS)) : 1

  return {
    totalEvents: events.length,
    pressCount,
    releaseCount: events.length - pressCount,
    dateRange,
    daysRecorded,
    averagePressesPerDay: Math.floor(pressCount / daysRecorded),
    topKeys: takeTop(countKeys(presses, pressCount), options?.topKeys ?? DEFAULT_TOP),
    topApplications: takeTop(
      countApplications(presses, pressCount),
      options?.topApplications ?? DEFAULT_TOP_APPLICATIONS,
    ),
  }
}

export function findDateRange(
  events: readonly KeystrokeEvent[],
): { start: number; end: number } | undefined {
  if (events.length === 0) return undefined

  let start = events[0].timestamp
  let end = events[0].timestamp
  for (const event of events) {
    if (event.timestamp < start) start = event.timestamp
    if (event.timestamp > end) end = event.timestamp
  }
  return { start, end }
}

/** `com.example.editor` → `editor`. */
export function shortApplicationName(application: string): string {
  const segments = application.split(".")
  return segments[segments.length - 1] || application
}

function countApplications(presses: readonly KeystrokeEvent[], total: number): ApplicationCount[] {
  const counts = new Map<string, number>()
  for (const event of presses) {
    counts.set(event.application, (counts.get(event.application) ?? 0) + 1)
  }

  const result = Array.from(counts.entries()).map(([application, count]) => ({
    application,
    shortName: shortApplicationName(application),
    count,
    percentage: toPercentage(count, total),
  }))

  result.sort((a, b) => {
    if (b.count === a.count) {
      return a.application < b.application ? -1 : a.application > b.application ? 1 : 0
    }
    return b.count - a.count
  })

  return result
}
