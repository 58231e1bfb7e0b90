import { dirname } from 'node:path'
import { mkdir, appendFile } from 'node:fs/promises'
import { colorize, type ColorName } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly highlight: (msg: string, color: ColorName) => string
  readonly json: (val: unknown) => void
  readonly event: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setNdjsonFile: (path: string) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly addRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly isJsonOnly: () => boolean
  readonly reset: () => void
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let ndjson = false
let timestampsOn = false
let ndjsonFilePath: string | undefined
let redactors: RegExp[] = []
let sinkFailed = false

async function safeAppend(path: string, line: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await appendFile(path, line, 'utf8')
  } catch (err) {
    if (sinkFailed) return
    sinkFailed = true
    const message: string = err instanceof Error ? err.message : String(err)
    // eslint-disable-next-line no-console
    console.error(`[warn] NDJSON file sink disabled: ${message}`)
  }
}

function applyRedaction(msg: string): string {
  if (redactors.length === 0) return msg
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function toPattern(p: string | RegExp): RegExp {
  return p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g')
}

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly) return
  if (!enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  // Colorize message content by level, unless msg is already colored
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = Object.fromEntries(Object.entries(val))
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`))
  },
  note: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`))
  },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    const head = `${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`
    // eslint-disable-next-line no-console
    console.log(head)
  },
  highlight: (msg: string, color: ColorName): string => colorize(color, msg),
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = applyRedaction(ndjson ? JSON.stringify(v) : JSON.stringify(v, null, 2))
    // eslint-disable-next-line no-console
    console.log(line)
    if (ndjsonFilePath) void safeAppend(ndjsonFilePath, applyRedaction(JSON.stringify(v)) + '\n')
  },
  event: (val: unknown): void => {
    const line: string = applyRedaction(JSON.stringify(enrichJson(val)))
    // Streaming events reach the console only in NDJSON mode; the file sink always gets them
    // eslint-disable-next-line no-console
    if (ndjson) console.log(line)
    if (ndjsonFilePath) void safeAppend(ndjsonFilePath, line + '\n')
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) jsonOnly = true },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setNdjsonFile: (path: string): void => { ndjsonFilePath = path.length > 0 ? path : undefined },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map(toPattern)
  },
  addRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = [...redactors, ...patterns.map(toPattern)]
  },
  isJsonOnly: (): boolean => jsonOnly,
  reset: (): void => {
    level = 'info'
    jsonOnly = false
    noEmoji = false
    ndjson = false
    timestampsOn = false
    ndjsonFilePath = undefined
    redactors = []
    sinkFailed = false
  }
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
