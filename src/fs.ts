import { access, mkdir, readFile, stat, writeFile } from "node:fs/promises"
import { constants } from "node:fs"
import { dirname } from "node:path"

export async function readTextFile(path: string): Promise<string> {
  await access(path, constants.F_OK)
  return await readFile(path, "utf8")
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, "utf8")
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}
