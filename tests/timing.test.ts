import { describe, expect, it } from "vitest"
import { combineFilterConfig } from "../src/filters.ts"
import {
  analyzeTiming,
  popPress,
  pressState,
  pushPress,
  topHoldDurations,
  topInterKeyPairs,
  type PressStacks,
} from "../src/timing.ts"
import { KEY, press, release } from "./fixtures.ts"

const config = combineFilterConfig()

describe("overall inter-key timing", () => {
  it("is all zero for no events", () => {
    const analysis = analyzeTiming([], config)
    expect(analysis.overallInterKey).toEqual({
      count: 0,
      meanMs: 0,
      medianMs: 0,
      p90Ms: 0,
      p95Ms: 0,
      p99Ms: 0,
    })
    expect(analysis.perKeyInterKey).toEqual([])
    expect(analysis.holdDurations).toEqual([])
    expect(analysis.unpairedPresses).toBe(0)
    expect(analysis.unpairedReleases).toBe(0)
  })

  it("measures gaps between consecutive presses", () => {
    const analysis = analyzeTiming([press(100, KEY.A), press(200, KEY.S), press(300, KEY.D)], config)
    expect(analysis.overallInterKey.count).toBe(2)
    expect(analysis.overallInterKey.meanMs).toBe(100)
    expect(analysis.overallInterKey.medianMs).toBe(100)
  })

  it("drops gaps at or above the configured ceiling", () => {
    const analysis = analyzeTiming([press(100, KEY.A), press(10000, KEY.S)], config)
    expect(analysis.overallInterKey.count).toBe(0)
  })

  it("drops zero and negative gaps from out-of-order input", () => {
    const analysis = analyzeTiming([press(100, KEY.A), press(100, KEY.S), press(50, KEY.D)], config)
    expect(analysis.overallInterKey.count).toBe(0)
  })

  it("reports ordered percentiles", () => {
    const events = Array.from({ length: 100 }, (_, i) => press(i * i * 10, KEY.A))
    const stats = analyzeTiming(events, combineFilterConfig({ maxGapMs: 100000 })).overallInterKey

    expect(stats.count).toBe(99)
    expect(stats.medianMs).toBeGreaterThan(0)
    expect(stats.medianMs).toBeLessThanOrEqual(stats.p90Ms)
    expect(stats.p90Ms).toBeLessThanOrEqual(stats.p95Ms)
    expect(stats.p95Ms).toBeLessThanOrEqual(stats.p99Ms)
  })

  it("carries a copy of the filter config", () => {
    const analysis = analyzeTiming([], config)
    expect(analysis.filterConfig).toEqual(config)
    expect(analysis.filterConfig).not.toBe(config)
  })
})

describe("per-pair inter-key timing", () => {
  const twoSamples = [press(0, KEY.A), press(100, KEY.S), press(1000, KEY.A), press(1100, KEY.S)]

  it("leaves out pairs below the sample floor", () => {
    expect(analyzeTiming(twoSamples, config).perKeyInterKey).toEqual([])
  })

  it("reports a pair once it has three samples", () => {
    const events = [...twoSamples, press(2000, KEY.A), press(2150, KEY.S)]
    const pairs = analyzeTiming(events, config).perKeyInterKey

    expect(pairs).toHaveLength(1)
    expect(pairs[0]).toEqual({
      fromKey: KEY.A,
      toKey: KEY.S,
      display: "A -> S",
      intervalsMs: [100, 100, 150],
      sampleCount: 3,
      meanMs: 350 / 3,
      medianMs: 100,
      p95Ms: 100,
    })
  })

  it("ranks pairs by sample count", () => {
    const events = [
      press(0, KEY.A),
      press(100, KEY.S),
      press(200, KEY.A),
      press(300, KEY.S),
      press(400, KEY.A),
      press(500, KEY.S),
      press(600, KEY.A),
    ]
    const pairs = analyzeTiming(events, config).perKeyInterKey

    expect(pairs.map((pair) => [pair.display, pair.sampleCount])).toEqual([
      ["A -> S", 3],
      ["S -> A", 3],
    ])
    expect(topInterKeyPairs(analyzeTiming(events, config), 1)).toHaveLength(1)
  })
})

describe("hold durations", () => {
  it("pairs each release with its press", () => {
    const analysis = analyzeTiming(
      [press(100, KEY.K), release(200, KEY.K), press(300, KEY.K), release(400, KEY.K)],
      config,
    )

    expect(analysis.holdDurations).toEqual([
      {
        keyCode: KEY.K,
        keyName: "K",
        durationsMs: [100, 100],
        sampleCount: 2,
        meanMs: 100,
        medianMs: 100,
        p95Ms: 100,
      },
    ])
  })

  it("drops durations outside the configured bounds", () => {
    const strict = combineFilterConfig({ minHoldMs: 50, maxHoldMs: 500 })
    const analysis = analyzeTiming(
      [press(100, KEY.A), release(110, KEY.A), press(200, KEY.S), release(1000, KEY.S)],
      strict,
    )
    expect(analysis.holdDurations).toEqual([])
  })

  it("keeps durations exactly at the bounds", () => {
    const analysis = analyzeTiming(
      [press(0, KEY.A), release(10, KEY.A), press(100, KEY.A), release(2100, KEY.A)],
      config,
    )
    expect(analysis.holdDurations[0].durationsMs).toEqual([10, 2000])
  })

  it("matches repeated presses last-in first-out", () => {
    const analysis = analyzeTiming([press(100, KEY.A), press(150, KEY.A), release(300, KEY.A)], config)

    expect(analysis.holdDurations[0].durationsMs).toEqual([150])
    expect(analysis.unpairedPresses).toBe(1)
  })

  it("ignores a release with no pending press", () => {
    const analysis = analyzeTiming([release(100, KEY.A)], config)
    expect(analysis.holdDurations).toEqual([])
    expect(analysis.unpairedReleases).toBe(1)
  })

  it("ranks keys by sample count, then key code", () => {
    const analysis = analyzeTiming(
      [
        press(100, KEY.D),
        release(200, KEY.D),
        press(300, KEY.S),
        release(450, KEY.S),
        press(500, KEY.S),
        release(650, KEY.S),
        press(700, KEY.A),
        release(780, KEY.A),
      ],
      config,
    )

    expect(analysis.holdDurations.map((hold) => [hold.keyName, hold.sampleCount])).toEqual([
      ["S", 2],
      ["A", 1],
      ["D", 1],
    ])
    expect(topHoldDurations(analysis, 1).map((hold) => hold.keyName)).toEqual(["S"])
  })

  it("never reports more samples than releases", () => {
    const events = [
      press(0, KEY.A),
      press(20, KEY.A),
      press(40, KEY.A),
      release(100, KEY.A),
      release(120, KEY.A),
    ]
    const [hold] = analyzeTiming(events, config).holdDurations
    expect(hold.sampleCount).toBeLessThanOrEqual(2)
    expect(hold.durationsMs).toEqual([60, 100])
  })
})

describe("press stacks", () => {
  it("moves between idle and pending", () => {
    const stacks: PressStacks = new Map()
    expect(pressState(stacks, KEY.A)).toEqual({ state: "idle" })

    pushPress(stacks, KEY.A, 100)
    pushPress(stacks, KEY.A, 200)
    expect(pressState(stacks, KEY.A)).toEqual({ state: "pending", depth: 2, pressedAt: 200 })

    expect(popPress(stacks, KEY.A)).toBe(200)
    expect(pressState(stacks, KEY.A)).toEqual({ state: "pending", depth: 1, pressedAt: 100 })
    expect(popPress(stacks, KEY.A)).toBe(100)
    expect(pressState(stacks, KEY.A)).toEqual({ state: "idle" })
    expect(popPress(stacks, KEY.A)).toBeUndefined()
  })
})
