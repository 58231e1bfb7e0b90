import { parse } from 'dotenv'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { fsx } from '../../utils/fs'

export type EnvRecord = Readonly<Record<string, string>>

/**
 * Parse a specific .env file without mutating process.env.
 * A missing file yields an empty record.
 */
export async function parseEnvFile(args: { readonly path: string }): Promise<EnvRecord> {
  if (!(await fsx.exists(args.path))) return {}
  const buf: string = await readFile(args.path, 'utf8')
  const parsed: Record<string, string> = parse(buf)
  const trimmed: Record<string, string> = {}
  for (const [k, v] of Object.entries(parsed)) {
    const tv: string = v.trim()
    if (tv.length > 0) trimmed[k] = tv
  }
  return trimmed
}

function processEnv(): EnvRecord {
  const out: Record<string, string> = {}
  for (const [k, v] of Object.entries(process.env)) if (typeof v === 'string') out[k] = v
  return out
}

/**
 * Environment visible to a release run.
 * Precedence (lowest first): .env, .env.local, process.env, then an explicit --env-file.
 */
export async function loadEnv(args: { readonly cwd: string; readonly envFile?: string; readonly base?: EnvRecord }): Promise<EnvRecord> {
  const dotEnv = await parseEnvFile({ path: join(args.cwd, '.env') })
  const dotEnvLocal = await parseEnvFile({ path: join(args.cwd, '.env.local') })
  let explicit: EnvRecord = {}
  if (typeof args.envFile === 'string' && args.envFile.length > 0) {
    const path = join(args.cwd, args.envFile)
    if (!(await fsx.exists(path))) throw new Error(`Env file not found: ${path}`)
    explicit = await parseEnvFile({ path })
  }
  return { ...dotEnv, ...dotEnvLocal, ...(args.base ?? processEnv()), ...explicit }
}
