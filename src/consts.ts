import type { FilterConfig } from "./types.ts"

export const DEFAULT_FILTER_CONFIG: Readonly<FilterConfig> = {
  maxGapMs: 5000,
  minHoldMs: 10,
  maxHoldMs: 2000,
}

// Bigram/trigram adjacency window. Fixed: does not follow FilterConfig.maxGapMs.
export const ADJACENCY_WINDOW_MS = 5000

// Key pairs with fewer retained intervals are left out of per-pair timing.
export const MIN_PAIR_SAMPLES = 3

export const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_TOP = 10
export const DEFAULT_TOP_APPLICATIONS = 5

export const APP_NAME = "keytally"
export const APP_VERSION = "0.1.0"
export const LOG_ENV_VAR = "KEYTALLY_LOG"
