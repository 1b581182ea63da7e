import type { PercentileSet } from "./types.ts"

export function sortAscending(values: readonly number[]): number[] {
  return values.slice().sort((a, b) => a - b)
}

/**
 * Nearest-rank percentile over values already sorted ascending:
 * `floor((n - 1) * p)`, no interpolation. `p` is clamped to [0, 1].
 * `undefined` when there are no samples or `p` is NaN.
 */
export function percentileOfSorted(sorted: readonly number[], p: number): number | undefined {
  if (sorted.length === 0 || Number.isNaN(p)) return undefined
  return sorted[rankIndex(sorted.length, Math.max(0, Math.min(1, p)))]
}

export function percentile(values: readonly number[], p: number): number | undefined {
  return percentileOfSorted(sortAscending(values), p)
}

export function percentiles(values: readonly number[]): PercentileSet | undefined {
  if (values.length === 0) return undefined
  const sorted = sortAscending(values)
  return {
    p50: sorted[rankIndex(sorted.length, 0.5)],
    p90: sorted[rankIndex(sorted.length, 0.9)],
    p95: sorted[rankIndex(sorted.length, 0.95)],
    p99: sorted[rankIndex(sorted.length, 0.99)],
  }
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (const value of values) sum += value
  return sum / values.length
}

function rankIndex(length: number, p: number): number {
  return Math.min(Math.floor((length - 1) * p), length - 1)
}
