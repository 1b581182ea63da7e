#!/usr/bin/env tsx
import { runCli } from "./commands.ts"

await runCli(process.argv.slice(2)).catch((error) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
