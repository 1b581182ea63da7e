import Papa from "papaparse"
import { writeTextFile } from "./fs.ts"
import { keyName } from "./keycode.ts"
import { findDateRange } from "./summary.ts"
import type { ExportFormat, KeystrokeEvent } from "./types.ts"

export const CSV_FIELDS = [
  "timestamp",
  "key_code",
  "key_name",
  "event_type",
  "modifiers",
  "application",
] as const

export type ExportOptions = {
  format: ExportFormat
  output: string
  now?: Date
}

export function renderCsv(events: readonly KeystrokeEvent[]): string {
  const rows = events.map((event) => [
    event.timestamp,
    event.keyCode,
    keyName(event.keyCode),
    event.kind,
    event.modifiers.join(";"),
    event.application,
  ])

  const csv = Papa.unparse({ fields: [...CSV_FIELDS], data: rows }, { newline: "\n" })
  return `${csv.replace(/\n$/, "")}\n`
}

export function renderJson(events: readonly KeystrokeEvent[], now: Date = new Date()): string {
  const dateRange = findDateRange(events)
  const payload = {
    metadata: {
      export_date: now.toISOString(),
      total_events: events.length,
      date_range: dateRange ?? null,
    },
    events: events.map((event) => ({
      timestamp: event.timestamp,
      key_code: event.keyCode,
      key_name: keyName(event.keyCode),
      event_type: event.kind,
      modifiers: event.modifiers,
      application: event.application,
    })),
  }

  return `${JSON.stringify(payload, null, 2)}\n`
}

export function normalizeExportFormat(input: string | undefined): ExportFormat {
  if (!input) return "csv"
  const value = input.toLowerCase()
  if (value === "csv" || value === "json") {
    return value
  }
  throw new Error(`Unknown export format '${input}'. Use 'csv' or 'json'.`)
}

/** Writes the export file and returns how many events went into it. */
export async function exportEvents(
  events: readonly KeystrokeEvent[],
  options: ExportOptions,
): Promise<number> {
  const content =
    options.format === "csv" ? renderCsv(events) : renderJson(events, options.now ?? new Date())
  await writeTextFile(options.output, content)
  return events.length
}
