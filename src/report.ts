import { topBigrams, topKeys, topTrigrams } from "./frequency.ts"
import { formatKeyCode } from "./keycode.ts"
import { topHoldDurations, topInterKeyPairs } from "./timing.ts"
import type { AnalysisReport, EventSummary } from "./types.ts"

export type ReportOptions = {
  top: number
  detailed?: boolean
}

export function renderAnalysis(report: AnalysisReport, options: ReportOptions): string[] {
  const { top } = options
  const detailed = Boolean(options.detailed)
  const { frequency, timing } = report
  const lines: string[] = []

  lines.push("=== keytally Analysis ===", "")
  lines.push(`Total events:     ${report.totalEvents}`)
  lines.push(
    `Typing segments:  ${report.segmentCount} (gaps > ${timing.filterConfig.maxGapMs}ms filtered)`,
  )
  lines.push(`Analyzed events:  ${report.analyzedEvents}`, "")
  lines.push(`Total key presses: ${frequency.totalPresses}`)

  lines.push("", `--- Top ${top} Keys ---`)
  topKeys(frequency, top).forEach((key, index) => {
    const code = detailed ? ` (${formatKeyCode(key.keyCode)})` : ""
    lines.push(
      `${rank(index)}. ${key.keyName.padEnd(15)}${code} ${String(key.count).padStart(8)} (${key.percentage.toFixed(2)}%)`,
    )
  })

  lines.push("", `--- Top ${top} Bigrams ---`)
  topBigrams(frequency, top).forEach((bigram, index) => {
    if (detailed) {
      const codes = `${formatKeyCode(bigram.firstKey)}->${formatKeyCode(bigram.secondKey)}`
      lines.push(
        `${rank(index)}. ${bigram.display.padEnd(25)} (${codes}) ${String(bigram.count).padStart(6)} (${bigram.percentage.toFixed(2)}%)`,
      )
    } else {
      lines.push(
        `${rank(index)}. ${bigram.display.padEnd(20)} ${String(bigram.count).padStart(8)} (${bigram.percentage.toFixed(2)}%)`,
      )
    }
  })

  lines.push("", `--- Top ${top} Trigrams ---`)
  topTrigrams(frequency, top).forEach((trigram, index) => {
    if (detailed) {
      const codes = trigram.keys.map((code) => formatKeyCode(code)).join("->")
      lines.push(
        `${rank(index)}. ${trigram.display.padEnd(35)} (${codes}) ${String(trigram.count).padStart(5)} (${trigram.percentage.toFixed(2)}%)`,
      )
    } else {
      lines.push(
        `${rank(index)}. ${trigram.display.padEnd(30)} ${String(trigram.count).padStart(8)} (${trigram.percentage.toFixed(2)}%)`,
      )
    }
  })

  const overall = timing.overallInterKey
  lines.push("", "--- Inter-Key Timing ---")
  lines.push(`Samples:    ${overall.count}`)
  lines.push(`Mean:       ${overall.meanMs.toFixed(1)}ms`)
  lines.push(`Median:     ${overall.medianMs}ms`)
  lines.push(`P90:        ${overall.p90Ms}ms`)
  lines.push(`P95:        ${overall.p95Ms}ms`)
  lines.push(`P99:        ${overall.p99Ms}ms`)

  if (detailed && timing.perKeyInterKey.length > 0) {
    lines.push("", `--- Top ${top} Key-Pair Timings ---`)
    topInterKeyPairs(timing, top).forEach((pair, index) => {
      const codes = `${formatKeyCode(pair.fromKey)}->${formatKeyCode(pair.toKey)}`
      lines.push(
        `${rank(index)}. ${codes}  mean=${pair.meanMs.toFixed(1)}ms median=${pair.medianMs}ms p95=${pair.p95Ms}ms (n=${pair.sampleCount})`,
      )
    })
  }

  lines.push("", `--- Top ${top} Hold Durations ---`)
  topHoldDurations(timing, top).forEach((hold, index) => {
    const code = detailed ? ` (${formatKeyCode(hold.keyCode)})` : ""
    lines.push(
      `${rank(index)}. ${hold.keyName.padEnd(15)}${code} mean=${hold.meanMs.toFixed(1)}ms median=${hold.medianMs}ms p95=${hold.p95Ms}ms (n=${hold.sampleCount})`,
    )
  })

  if (detailed) {
    lines.push(`Unpaired presses: ${timing.unpairedPresses}, unpaired releases: ${timing.unpairedReleases}`)
    lines.push("", "--- Filter Config ---")
    lines.push(`Max gap:    ${timing.filterConfig.maxGapMs}ms`)
    lines.push(`Min hold:   ${timing.filterConfig.minHoldMs}ms`)
    lines.push(`Max hold:   ${timing.filterConfig.maxHoldMs}ms`)
  }

  return lines
}

/** Analysis payload for `--format json`; raw sample arrays are left out. */
export function analysisToJson(report: AnalysisReport, options: ReportOptions) {
  const { frequency, timing } = report
  return {
    events: report.totalEvents,
    segments: report.segmentCount,
    analyzedEvents: report.analyzedEvents,
    totalPresses: frequency.totalPresses,
    keys: topKeys(frequency, options.top),
    bigrams: topBigrams(frequency, options.top),
    trigrams: topTrigrams(frequency, options.top),
    interKey: timing.overallInterKey,
    keyPairs: topInterKeyPairs(timing, options.top).map(({ intervalsMs: _samples, ...pair }) => pair),
    holdDurations: topHoldDurations(timing, options.top).map(
      ({ durationsMs: _samples, ...hold }) => hold,
    ),
    unpairedPresses: timing.unpairedPresses,
    unpairedReleases: timing.unpairedReleases,
    filterConfig: timing.filterConfig,
  }
}

export function renderSummary(summary: EventSummary): string[] {
  const lines: string[] = ["=== keytally Statistics ===", ""]

  lines.push(`Total Events:     ${summary.totalEvents}`)
  lines.push(`Key Presses:      ${summary.pressCount}`)
  lines.push(`Key Releases:     ${summary.releaseCount}`)

  if (summary.dateRange) {
    lines.push("", "Date Range:")
    lines.push(`  Start: ${formatUtc(summary.dateRange.start)}`)
    lines.push(`  End:   ${formatUtc(summary.dateRange.end)}`)
    lines.push(`  Duration: ${summary.daysRecorded} days`)
    lines.push("", `Average: ${summary.averagePressesPerDay} presses/day`)
  }

  lines.push("", `--- Top ${summary.topKeys.length} Keys ---`)
  summary.topKeys.forEach((key, index) => {
    lines.push(
      `${rank(index)}. ${key.keyName.padEnd(15)} ${String(key.count).padStart(8)} (${key.percentage.toFixed(1)}%)`,
    )
  })

  lines.push("", `--- Top ${summary.topApplications.length} Applications ---`)
  summary.topApplications.forEach((app, index) => {
    lines.push(
      `${rank(index)}. ${app.shortName.padEnd(25)} ${String(app.count).padStart(8)} (${app.percentage.toFixed(1)}%)`,
    )
  })

  return lines
}

/** `2023-11-14 22:13:20 UTC` */
export function formatUtc(timestamp: number): string {
  const date = new Date(timestamp)
  if (Number.isNaN(date.getTime())) return String(timestamp)
  const iso = date.toISOString()
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`
}

function rank(index: number): string {
  return String(index + 1).padStart(2)
}
