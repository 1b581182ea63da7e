import { ADJACENCY_WINDOW_MS } from "./consts.ts"
import { keyName, keySequenceLabel } from "./keycode.ts"
import type { BigramCount, FrequencyAnalysis, KeyCount, KeystrokeEvent, TrigramCount } from "./types.ts"

export function analyzeFrequency(events: readonly KeystrokeEvent[]): FrequencyAnalysis {
  const presses = events.filter((event) => event.kind === "press")
  const totalPresses = presses.length

  return {
    totalPresses,
    keyFrequencies: countKeys(presses, totalPresses),
    bigramFrequencies: countBigrams(presses),
    trigramFrequencies: countTrigrams(presses),
  }
}

export function topKeys(analysis: FrequencyAnalysis, n: number): KeyCount[] {
  return takeTop(analysis.keyFrequencies, n)
}

export function topBigrams(analysis: FrequencyAnalysis, n: number): BigramCount[] {
  return takeTop(analysis.bigramFrequencies, n)
}

export function topTrigrams(analysis: FrequencyAnalysis, n: number): TrigramCount[] {
  return takeTop(analysis.trigramFrequencies, n)
}

export function takeTop<T>(entries: readonly T[], n: number): T[] {
  if (!(n > 0)) return []
  return entries.slice(0, Math.floor(n))
}

export function countKeys(presses: readonly KeystrokeEvent[], total: number): KeyCount[] {
  const counts = new Map<number, number>()
  for (const event of presses) {
    counts.set(event.keyCode, (counts.get(event.keyCode) ?? 0) + 1)
  }

  const result = Array.from(counts.entries()).map(([keyCode, count]) => ({
    keyCode,
    keyName: keyName(keyCode),
    count,
    percentage: toPercentage(count, total),
  }))

  result.sort((a, b) => {
    if (b.count === a.count) {
      return a.keyCode - b.keyCode
    }
    return b.count - a.count
  })

  return result
}

function countBigrams(presses: readonly KeystrokeEvent[]): BigramCount[] {
  const counts = new Map<string, { firstKey: number; secondKey: number; count: number }>()

  for (let i = 1; i < presses.length; i++) {
    const first = presses[i - 1]
    const second = presses[i]
    if (!withinAdjacencyWindow(first, second)) continue

    const signature = `${first.keyCode}:${second.keyCode}`
    const existing = counts.get(signature)
    if (existing) {
      existing.count++
    } else {
      counts.set(signature, { firstKey: first.keyCode, secondKey: second.keyCode, count: 1 })
    }
  }

  const total = sumCounts(counts.values())
  const result = Array.from(counts.values()).map(({ firstKey, secondKey, count }) => ({
    firstKey,
    secondKey,
    display: keySequenceLabel([firstKey, secondKey]),
    count,
    percentage: toPercentage(count, total),
  }))

  result.sort(
    (a, b) => b.count - a.count || a.firstKey - b.firstKey || a.secondKey - b.secondKey,
  )

  return result
}

function countTrigrams(presses: readonly KeystrokeEvent[]): TrigramCount[] {
  const counts = new Map<string, { keys: [number, number, number]; count: number }>()

  for (let i = 2; i < presses.length; i++) {
    const [first, second, third] = [presses[i - 2], presses[i - 1], presses[i]]
    if (!withinAdjacencyWindow(first, second) || !withinAdjacencyWindow(second, third)) continue

    const keys: [number, number, number] = [first.keyCode, second.keyCode, third.keyCode]
    const signature = keys.join(":")
    const existing = counts.get(signature)
    if (existing) {
      existing.count++
    } else {
      counts.set(signature, { keys, count: 1 })
    }
  }

  const total = sumCounts(counts.values())
  const result = Array.from(counts.values()).map(({ keys, count }) => ({
    keys,
    display: keySequenceLabel(keys),
    count,
    percentage: toPercentage(count, total),
  }))

  result.sort(
    (a, b) =>
      b.count - a.count ||
      a.keys[0] - b.keys[0] ||
      a.keys[1] - b.keys[1] ||
      a.keys[2] - b.keys[2],
  )

  return result
}

// Strict `<`; a negative gap (out-of-order input) still counts as adjacent.
function withinAdjacencyWindow(previous: KeystrokeEvent, current: KeystrokeEvent): boolean {
  return current.timestamp - previous.timestamp < ADJACENCY_WINDOW_MS
}

function sumCounts(entries: Iterable<{ count: number }>): number {
  let total = 0
  for (const entry of entries) total += entry.count
  return total
}

export function toPercentage(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0
}
