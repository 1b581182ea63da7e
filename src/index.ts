export { analyzeEvents } from "./analyzer.ts"
export { ADJACENCY_WINDOW_MS, DEFAULT_FILTER_CONFIG, MIN_PAIR_SAMPLES } from "./consts.ts"
export { exportEvents, renderCsv, renderJson } from "./export.ts"
export {
  combineFilterConfig,
  flattenSegments,
  isValidHoldDuration,
  isValidInterval,
  segmentByGap,
  sliceSegment,
} from "./filters.ts"
export { analyzeFrequency, topBigrams, topKeys, topTrigrams } from "./frequency.ts"
export { formatKeyCode, keyName } from "./keycode.ts"
export { filterByTimeRange, parseKeystrokeLog, readKeystrokeLog, sinceDays } from "./log.ts"
export { mean, percentile, percentiles } from "./percentile.ts"
export { summarizeEvents } from "./summary.ts"
export { analyzeTiming, pressState, topHoldDurations, topInterKeyPairs } from "./timing.ts"
export type * from "./types.ts"
