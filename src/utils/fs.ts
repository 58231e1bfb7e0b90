import { readFile, stat } from 'node:fs/promises'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly readJson: (path: string) => Promise<unknown>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

/** Read and parse a JSON file. Returns `undefined` when the file is missing; malformed JSON throws. */
async function readJson(path: string): Promise<unknown> {
  if (!(await exists(path))) return undefined
  const buf: string = await readFile(path, 'utf8')
  const parsed: unknown = JSON.parse(buf)
  return parsed
}

export const fsx: FSX = { exists, readJson }
