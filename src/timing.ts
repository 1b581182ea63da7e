import { MIN_PAIR_SAMPLES } from "./consts.ts"
import { isValidHoldDuration, isValidInterval } from "./filters.ts"
import { takeTop } from "./frequency.ts"
import { keyName, keySequenceLabel } from "./keycode.ts"
import { mean, percentileOfSorted, percentiles, sortAscending } from "./percentile.ts"
import type {
  FilterConfig,
  HoldDuration,
  InterKeyInterval,
  InterKeyStats,
  KeystrokeEvent,
  TimingAnalysis,
} from "./types.ts"

export type PressState =
  | { state: "idle" }
  | { state: "pending"; depth: number; pressedAt: number }

/** Pending press timestamps per key code, most recent last. */
export type PressStacks = Map<number, number[]>

const EMPTY_INTER_KEY_STATS: InterKeyStats = {
  count: 0,
  meanMs: 0,
  medianMs: 0,
  p90Ms: 0,
  p95Ms: 0,
  p99Ms: 0,
}

export function analyzeTiming(
  events: readonly KeystrokeEvent[],
  config: FilterConfig,
): TimingAnalysis {
  const intervals = collectPressIntervals(events, config)
  const holds = collectHoldDurations(events, config)

  return {
    overallInterKey: summarizeIntervals(intervals.map((interval) => interval.gapMs)),
    perKeyInterKey: summarizePairs(intervals),
    holdDurations: summarizeHolds(holds.durations),
    unpairedPresses: holds.unpairedPresses,
    unpairedReleases: holds.unpairedReleases,
    filterConfig: { ...config },
  }
}

export function topInterKeyPairs(analysis: TimingAnalysis, n: number): InterKeyInterval[] {
  return takeTop(analysis.perKeyInterKey, n)
}

export function topHoldDurations(analysis: TimingAnalysis, n: number): HoldDuration[] {
  return takeTop(analysis.holdDurations, n)
}

type PressInterval = {
  fromKey: number
  toKey: number
  gapMs: number
}

function collectPressIntervals(
  events: readonly KeystrokeEvent[],
  config: FilterConfig,
): PressInterval[] {
  const intervals: PressInterval[] = []
  let previous: KeystrokeEvent | undefined

  for (const event of events) {
    if (event.kind !== "press") continue
    if (previous) {
      const gapMs = event.timestamp - previous.timestamp
      if (isValidInterval(config, gapMs)) {
        intervals.push({ fromKey: previous.keyCode, toKey: event.keyCode, gapMs })
      }
    }
    previous = event
  }

  return intervals
}

function summarizeIntervals(gaps: readonly number[]): InterKeyStats {
  const set = percentiles(gaps)
  if (!set) return { ...EMPTY_INTER_KEY_STATS }

  return {
    count: gaps.length,
    meanMs: mean(gaps),
    medianMs: set.p50,
    p90Ms: set.p90,
    p95Ms: set.p95,
    p99Ms: set.p99,
  }
}

function summarizePairs(intervals: readonly PressInterval[]): InterKeyInterval[] {
  const grouped = new Map<string, { fromKey: number; toKey: number; gaps: number[] }>()

  for (const { fromKey, toKey, gapMs } of intervals) {
    const signature = `${fromKey}:${toKey}`
    const existing = grouped.get(signature)
    if (existing) {
      existing.gaps.push(gapMs)
    } else {
      grouped.set(signature, { fromKey, toKey, gaps: [gapMs] })
    }
  }

  const result: InterKeyInterval[] = []
  for (const { fromKey, toKey, gaps } of grouped.values()) {
    if (gaps.length < MIN_PAIR_SAMPLES) continue
    const sorted = sortAscending(gaps)
    result.push({
      fromKey,
      toKey,
      display: keySequenceLabel([fromKey, toKey]),
      intervalsMs: sorted,
      sampleCount: sorted.length,
      meanMs: mean(sorted),
      medianMs: percentileOfSorted(sorted, 0.5) ?? 0,
      p95Ms: percentileOfSorted(sorted, 0.95) ?? 0,
    })
  }

  result.sort(
    (a, b) => b.sampleCount - a.sampleCount || a.fromKey - b.fromKey || a.toKey - b.toKey,
  )

  return result
}

/** `pressedAt` is the most recent pending press, the one a release pairs with. */
export function pressState(stacks: PressStacks, keyCode: number): PressState {
  const stack = stacks.get(keyCode)
  if (!stack || stack.length === 0) return { state: "idle" }
  return { state: "pending", depth: stack.length, pressedAt: stack[stack.length - 1] }
}

export function pushPress(stacks: PressStacks, keyCode: number, timestamp: number): void {
  const stack = stacks.get(keyCode)
  if (stack) {
    stack.push(timestamp)
  } else {
    stacks.set(keyCode, [timestamp])
  }
}

/** Most recent pending press for the key, or `undefined` when idle. */
export function popPress(stacks: PressStacks, keyCode: number): number | undefined {
  return stacks.get(keyCode)?.pop()
}

type HoldCollection = {
  durations: Map<number, number[]>
  unpairedPresses: number
  unpairedReleases: number
}

function collectHoldDurations(
  events: readonly KeystrokeEvent[],
  config: FilterConfig,
): HoldCollection {
  const stacks: PressStacks = new Map()
  const durations = new Map<number, number[]>()
  let unpairedReleases = 0

  for (const event of events) {
    if (event.kind === "press") {
      pushPress(stacks, event.keyCode, event.timestamp)
      continue
    }

    const state = pressState(stacks, event.keyCode)
    if (state.state === "idle") {
      unpairedReleases++
      continue
    }

    popPress(stacks, event.keyCode)
    const duration = event.timestamp - state.pressedAt
    if (!isValidHoldDuration(config, duration)) continue

    const samples = durations.get(event.keyCode)
    if (samples) {
      samples.push(duration)
    } else {
      durations.set(event.keyCode, [duration])
    }
  }

  let unpairedPresses = 0
  for (const stack of stacks.values()) unpairedPresses += stack.length

  return { durations, unpairedPresses, unpairedReleases }
}

function summarizeHolds(durations: Map<number, number[]>): HoldDuration[] {
  const result: HoldDuration[] = []

  for (const [keyCode, samples] of durations.entries()) {
    const sorted = sortAscending(samples)
    result.push({
      keyCode,
      keyName: keyName(keyCode),
      durationsMs: sorted,
      sampleCount: sorted.length,
      meanMs: mean(sorted),
      medianMs: percentileOfSorted(sorted, 0.5) ?? 0,
      p95Ms: percentileOfSorted(sorted, 0.95) ?? 0,
    })
  }

  result.sort((a, b) => b.sampleCount - a.sampleCount || a.keyCode - b.keyCode)

  return result
}
