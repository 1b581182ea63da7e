export type EventKind = "press" | "release"

export type Modifier = "shift" | "control" | "alt" | "command" | "capslock" | "function"

export type KeystrokeEvent = {
  /** Milliseconds since the Unix epoch. */
  timestamp: number
  keyCode: number
  kind: EventKind
  modifiers: Modifier[]
  application: string
}

export type FilterConfig = {
  maxGapMs: number
  minHoldMs: number
  maxHoldMs: number
}

export type FilterOptions = Partial<FilterConfig>

/** Half-open `[start, end)` index range into the analyzed event array. */
export type TypingSegment = {
  start: number
  end: number
}

export type KeyCount = {
  keyCode: number
  keyName: string
  count: number
  percentage: number
}

export type BigramCount = {
  firstKey: number
  secondKey: number
  display: string
  count: number
  percentage: number
}

export type TrigramCount = {
  keys: readonly [number, number, number]
  display: string
  count: number
  percentage: number
}

export type FrequencyAnalysis = {
  readonly totalPresses: number
  readonly keyFrequencies: readonly KeyCount[]
  readonly bigramFrequencies: readonly BigramCount[]
  readonly trigramFrequencies: readonly TrigramCount[]
}

export type PercentileSet = {
  p50: number
  p90: number
  p95: number
  p99: number
}

export type InterKeyStats = {
  count: number
  meanMs: number
  medianMs: number
  p90Ms: number
  p95Ms: number
  p99Ms: number
}

export type InterKeyInterval = {
  fromKey: number
  toKey: number
  display: string
  intervalsMs: readonly number[]
  sampleCount: number
  meanMs: number
  medianMs: number
  p95Ms: number
}

export type HoldDuration = {
  keyCode: number
  keyName: string
  durationsMs: readonly number[]
  sampleCount: number
  meanMs: number
  medianMs: number
  p95Ms: number
}

export type TimingAnalysis = {
  readonly overallInterKey: InterKeyStats
  readonly perKeyInterKey: readonly InterKeyInterval[]
  readonly holdDurations: readonly HoldDuration[]
  readonly unpairedPresses: number
  readonly unpairedReleases: number
  readonly filterConfig: FilterConfig
}

export type AnalysisReport = {
  totalEvents: number
  segmentCount: number
  analyzedEvents: number
  frequency: FrequencyAnalysis
  timing: TimingAnalysis
}

export type TimeRange = {
  start?: number
  end?: number
}

export type ApplicationCount = {
  application: string
  shortName: string
  count: number
  percentage: number
}

export type EventSummary = {
  totalEvents: number
  pressCount: number
  releaseCount: number
  dateRange?: { start: number; end: number }
  daysRecorded: number
  averagePressesPerDay: number
  topKeys: KeyCount[]
  topApplications: ApplicationCount[]
}

export type ExportFormat = "csv" | "json"
