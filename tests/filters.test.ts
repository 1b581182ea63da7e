import { describe, expect, it } from "vitest"
import {
  combineFilterConfig,
  flattenSegments,
  isValidHoldDuration,
  isValidInterval,
  segmentByGap,
  sliceSegment,
} from "../src/filters.ts"
import { press } from "./fixtures.ts"

const config = combineFilterConfig()

describe("combineFilterConfig", () => {
  it("falls back to the defaults", () => {
    expect(config).toEqual({ maxGapMs: 5000, minHoldMs: 10, maxHoldMs: 2000 })
  })

  it("merges partial overrides", () => {
    expect(combineFilterConfig({ maxGapMs: 800 })).toEqual({
      maxGapMs: 800,
      minHoldMs: 10,
      maxHoldMs: 2000,
    })
  })
})

describe("isValidInterval", () => {
  it("accepts strictly positive gaps below the ceiling", () => {
    expect(isValidInterval(config, 1)).toBe(true)
    expect(isValidInterval(config, 100)).toBe(true)
    expect(isValidInterval(config, 4999)).toBe(true)
  })

  it("rejects zero, negative and over-ceiling gaps", () => {
    expect(isValidInterval(config, 0)).toBe(false)
    expect(isValidInterval(config, -1)).toBe(false)
    expect(isValidInterval(config, 5000)).toBe(false)
    expect(isValidInterval(config, 10000)).toBe(false)
  })
})

describe("isValidHoldDuration", () => {
  it("is inclusive at both bounds", () => {
    expect(isValidHoldDuration(config, 10)).toBe(true)
    expect(isValidHoldDuration(config, 100)).toBe(true)
    expect(isValidHoldDuration(config, 2000)).toBe(true)
  })

  it("rejects durations outside the bounds", () => {
    expect(isValidHoldDuration(config, 9)).toBe(false)
    expect(isValidHoldDuration(config, 2001)).toBe(false)
    expect(isValidHoldDuration(config, -50)).toBe(false)
  })
})

describe("segmentByGap", () => {
  it("returns no segments for empty input", () => {
    expect(segmentByGap([], config)).toEqual([])
  })

  it("wraps a single event in one segment", () => {
    expect(segmentByGap([press(100)], config)).toEqual([{ start: 0, end: 1 }])
  })

  it("keeps a continuous run together", () => {
    const events = [press(100), press(200), press(300)]
    expect(segmentByGap(events, config)).toEqual([{ start: 0, end: 3 }])
  })

  it("splits where the gap exceeds the threshold", () => {
    const events = [press(100), press(200), press(10000), press(10100)]
    const segments = segmentByGap(events, config)

    expect(segments).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
    ])
    expect(segments.map((segment) => sliceSegment(events, segment).length)).toEqual([2, 2])
  })

  it("does not split on a gap equal to the threshold", () => {
    const events = [press(0), press(5000), press(10001)]
    expect(segmentByGap(events, config)).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 3 },
    ])
  })

  it("partitions the input exactly and in order", () => {
    const timestamps = [0, 10, 6000, 6001, 6002, 20000, 30000, 30100]
    const events = timestamps.map((timestamp, index) => press(timestamp, index))
    const segments = segmentByGap(events, config)

    expect(segments).toHaveLength(4)
    expect(segments.reduce((sum, segment) => sum + (segment.end - segment.start), 0)).toBe(
      events.length,
    )
    for (let i = 1; i < segments.length; i++) {
      expect(segments[i].start).toBe(segments[i - 1].end)
    }
    expect(flattenSegments(events, segments)).toEqual(events)
  })

  it("honours a custom threshold", () => {
    const events = [press(0), press(300), press(900)]
    expect(segmentByGap(events, combineFilterConfig({ maxGapMs: 500 }))).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 3 },
    ])
  })
})
