import { z } from "zod"
import { DAY_MS } from "./consts.ts"
import { readTextFile } from "./fs.ts"
import type { KeystrokeEvent, TimeRange } from "./types.ts"

export const ModifierSchema = z.enum(["shift", "control", "alt", "command", "capslock", "function"])

export const EventKindSchema = z.enum(["press", "release"])

/** One JSONL line as written by the capture daemon. */
export const LogLineSchema = z
  .object({
    timestamp: z.number().int(),
    key_code: z.number().int().min(0).max(0xffffffff),
    event_type: EventKindSchema,
    modifiers: z.array(ModifierSchema).default([]),
    application: z.string().default(""),
  })
  .transform(
    (line): KeystrokeEvent => ({
      timestamp: line.timestamp,
      keyCode: line.key_code,
      kind: line.event_type,
      modifiers: line.modifiers,
      application: line.application,
    }),
  )

export type LogLine = z.input<typeof LogLineSchema>

export async function readKeystrokeLog(path: string): Promise<KeystrokeEvent[]> {
  const text = await readTextFile(path)
  return parseKeystrokeLog(text)
}

export function parseKeystrokeLog(text: string): KeystrokeEvent[] {
  const events: KeystrokeEvent[] = []

  const lines = text.split(/\r?\n/)
  for (const [index, line] of lines.entries()) {
    const trimmed = line.trim()
    if (!trimmed) continue

    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    } catch (error) {
      console.warn(`Skipping malformed log line ${index + 1}: ${error}`)
      continue
    }

    const result = LogLineSchema.safeParse(parsed)
    if (!result.success) {
      console.warn(`Skipping invalid log line ${index + 1}: ${describeIssues(result.error)}`)
      continue
    }
    events.push(result.data)
  }

  // Array.prototype.sort is stable, so equal timestamps keep log order.
  return events.sort((a, b) => a.timestamp - b.timestamp)
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}

/** Inclusive on both ends; an absent bound is open. */
export function filterByTimeRange(
  events: readonly KeystrokeEvent[],
  range: TimeRange,
): KeystrokeEvent[] {
  const start = range.start ?? Number.NEGATIVE_INFINITY
  const end = range.end ?? Number.POSITIVE_INFINITY
  return events.filter((event) => event.timestamp >= start && event.timestamp <= end)
}

export function sinceDays(days: number, now: number = Date.now()): TimeRange {
  return { start: now - days * DAY_MS, end: now }
}

export function toLogLine(event: KeystrokeEvent): string {
  const line: LogLine = {
    timestamp: event.timestamp,
    key_code: event.keyCode,
    event_type: event.kind,
    modifiers: event.modifiers,
    application: event.application,
  }
  return JSON.stringify(line)
}
