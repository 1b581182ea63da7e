import keyNameTable from "./keycode-names.json"

const keyNames = new Map<number, string>(
  Object.entries(keyNameTable).map(([code, name]) => [Number.parseInt(code, 16), name]),
)

/** `0x2A` style, at least two uppercase hex digits. */
export function formatKeyCode(code: number): string {
  return `0x${code.toString(16).toUpperCase().padStart(2, "0")}`
}

/** Human-readable label for a macOS virtual key code. */
export function keyName(code: number): string {
  return keyNames.get(code) ?? `Unknown(${formatKeyCode(code)})`
}

export function keySequenceLabel(codes: readonly number[]): string {
  return codes.map((code) => keyName(code)).join(" -> ")
}
