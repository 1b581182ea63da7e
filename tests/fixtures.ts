import type { KeystrokeEvent } from "../src/types.ts"

export const KEY = {
  A: 0x00,
  S: 0x01,
  D: 0x02,
  F: 0x03,
  K: 0x28,
} as const

export function press(timestamp: number, keyCode: number = KEY.A): KeystrokeEvent {
  return { timestamp, keyCode, kind: "press", modifiers: [], application: "com.example.editor" }
}

export function release(timestamp: number, keyCode: number = KEY.A): KeystrokeEvent {
  return { timestamp, keyCode, kind: "release", modifiers: [], application: "com.example.editor" }
}
