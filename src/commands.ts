import { cli, define } from "gunshi"
import type { CliOptions } from "gunshi"
import { resolve } from "node:path"
import { analyzeEvents } from "./analyzer.ts"
import {
  APP_NAME,
  APP_VERSION,
  DEFAULT_FILTER_CONFIG,
  DEFAULT_TOP,
  DEFAULT_TOP_APPLICATIONS,
  LOG_ENV_VAR,
} from "./consts.ts"
import { exportEvents, normalizeExportFormat } from "./export.ts"
import { pathExists } from "./fs.ts"
import { filterByTimeRange, readKeystrokeLog, sinceDays } from "./log.ts"
import { analysisToJson, renderAnalysis, renderSummary } from "./report.ts"
import { summarizeEvents } from "./summary.ts"
import type { KeystrokeEvent } from "./types.ts"

type OutputFormat = "human" | "json"

export const defaultLogPath = () => {
  const override = process.env[LOG_ENV_VAR]
  if (override && override.length > 0) return override

  const xdgPath = process.env.XDG_DATA_HOME
  const base =
    xdgPath && xdgPath.length > 0
      ? xdgPath
      : process.env.HOME
        ? `${process.env.HOME}/.local/share`
        : "."
  return `${base}/${APP_NAME}/events.jsonl`
}

const logArg = {
  type: "string",
  short: "l",
  description: `Path to keystroke JSONL log (env ${LOG_ENV_VAR})`,
} as const

const daysArg = {
  type: "number",
  short: "d",
  description: "Limit to events from the last N days",
} as const

export const analyzeCommand = define({
  name: "analyze",
  description: "Analyze typing patterns: n-gram frequencies, inter-key timing and hold durations.",
  args: {
    log: logArg,
    days: daysArg,
    top: {
      type: "number",
      short: "t",
      description: "Number of top items to show",
      default: DEFAULT_TOP,
    },
    "max-gap": {
      type: "number",
      description: "Session break threshold in ms; longer intervals are dropped as noise",
      default: DEFAULT_FILTER_CONFIG.maxGapMs,
    },
    "min-hold": {
      type: "number",
      description: "Shortest plausible key hold in ms",
      default: DEFAULT_FILTER_CONFIG.minHoldMs,
    },
    "max-hold": {
      type: "number",
      description: "Longest plausible key hold in ms",
      default: DEFAULT_FILTER_CONFIG.maxHoldMs,
    },
    detailed: {
      type: "boolean",
      description: "Show key codes, per-pair timing and the filter config",
      default: false,
    },
    format: {
      type: "string",
      short: "f",
      description: "Output format (human|json)",
      default: "human",
    },
  },
  run: async (ctx) => {
    const values = ctx.values
    const format = normalizeFormat(values.format)
    const top = requireCount("top", values.top ?? DEFAULT_TOP)
    const maxGapMs = requireCount("max-gap", values["max-gap"] ?? DEFAULT_FILTER_CONFIG.maxGapMs)
    const minHoldMs = requireCount("min-hold", values["min-hold"] ?? DEFAULT_FILTER_CONFIG.minHoldMs)
    const maxHoldMs = requireCount("max-hold", values["max-hold"] ?? DEFAULT_FILTER_CONFIG.maxHoldMs)
    if (minHoldMs > maxHoldMs) {
      throw new Error(`--min-hold (${minHoldMs}) must not exceed --max-hold (${maxHoldMs})`)
    }

    const logPath = resolvePath(values.log ?? defaultLogPath())
    if (format === "human") {
      console.log(`[${APP_NAME}] Analyzing log at ${logPath} ...`)
    }

    const events = await loadEvents(logPath, values.days)
    if (!events) return

    const report = analyzeEvents(events, { maxGapMs, minHoldMs, maxHoldMs })

    if (format === "json") {
      console.log(JSON.stringify({ logPath, ...analysisToJson(report, { top }) }, null, 2))
      return
    }

    for (const line of renderAnalysis(report, { top, detailed: Boolean(values.detailed) })) {
      console.log(line)
    }
  },
})

export const statsCommand = define({
  name: "stats",
  description: "Show totals, recorded date range, top keys and top applications.",
  args: {
    log: logArg,
    days: daysArg,
    top: {
      type: "number",
      short: "t",
      description: "Number of top keys to show",
      default: DEFAULT_TOP,
    },
    apps: {
      type: "number",
      description: "Number of top applications to show",
      default: DEFAULT_TOP_APPLICATIONS,
    },
  },
  run: async (ctx) => {
    const values = ctx.values
    const topKeys = requireCount("top", values.top ?? DEFAULT_TOP)
    const topApplications = requireCount("apps", values.apps ?? DEFAULT_TOP_APPLICATIONS)

    const events = await loadEvents(resolvePath(values.log ?? defaultLogPath()), values.days)
    if (!events) return

    for (const line of renderSummary(summarizeEvents(events, { topKeys, topApplications }))) {
      console.log(line)
    }
  },
})

export const exportCommand = define({
  name: "export",
  description: "Export keystroke events as CSV or JSON.",
  args: {
    log: logArg,
    days: daysArg,
    format: {
      type: "string",
      short: "f",
      description: "Output format (csv|json)",
      default: "csv",
    },
    output: {
      type: "string",
      short: "o",
      description: "Output file path (required)",
    },
  },
  run: async (ctx) => {
    const values = ctx.values
    const format = normalizeExportFormat(values.format)
    if (!values.output) {
      throw new Error("Missing required --output path")
    }
    const output = resolvePath(values.output)

    const events = await loadEvents(resolvePath(values.log ?? defaultLogPath()), values.days, {
      allowEmpty: true,
    })
    if (!events) return

    const written = await exportEvents(events, { format, output })
    console.log(`Exported ${written} events to ${output}`)
  },
})

export async function runCli(argv: string[]) {
  const subCommands: NonNullable<CliOptions["subCommands"]> = new Map()
  subCommands.set("analyze", analyzeCommand)
  subCommands.set("stats", statsCommand)
  subCommands.set("export", exportCommand)

  return await cli(attachNegativeValues(argv), analyzeCommand, {
    name: APP_NAME,
    version: APP_VERSION,
    description: "Typing-pattern analytics for recorded keystroke logs.",
    renderHeader: null,
    subCommands,
  })
}

/**
 * `--top -1` becomes `--top=-1`; the option tokenizer would otherwise read
 * `-1` as a short flag.
 */
function attachNegativeValues(argv: readonly string[]): string[] {
  const result: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    const next = argv[i + 1]
    const isLongFlag = token.length > 2 && token.startsWith("--") && !token.includes("=")
    if (isLongFlag && next !== undefined && /^-\d/.test(next)) {
      result.push(`${token}=${next}`)
      i++
    } else {
      result.push(token)
    }
  }
  return result
}

/**
 * Load, optionally restrict to the last `days` days, and report missing or
 * empty logs. `null` means there is nothing to analyze.
 */
async function loadEvents(
  logPath: string,
  days: number | undefined,
  options?: { allowEmpty?: boolean },
): Promise<KeystrokeEvent[] | null> {
  if (!(await pathExists(logPath))) {
    console.error(`No keystroke log found at ${logPath}`)
    console.error("Make sure the capture daemon has been run at least once.")
    return null
  }

  const all = await readKeystrokeLog(logPath)
  const events = days === undefined ? all : filterByTimeRange(all, sinceDays(requireCount("days", days)))

  if (events.length === 0 && !options?.allowEmpty) {
    console.error("No keystroke data recorded yet.")
    return null
  }
  return events
}

function requireCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative integer, got '${value}'`)
  }
  return value
}

function resolvePath(path: string): string {
  if (path.startsWith("~")) {
    const home = process.env.HOME
    if (home) {
      return resolve(path.replace("~", home))
    }
  }
  return resolve(path)
}

function normalizeFormat(input: string | undefined): OutputFormat {
  if (!input) return "human"
  const value = input.toLowerCase()
  if (value === "human" || value === "json") {
    return value
  }
  throw new Error(`Unknown format '${input}'`)
}
