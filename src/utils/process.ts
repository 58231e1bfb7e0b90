import { spawn, type SpawnOptions as NodeSpawnOptions } from 'node:child_process'
import { EOL } from 'node:os'
import { redact } from './redaction'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  /** Written to the child's stdin, which is then closed. */
  readonly stdin?: string
  readonly timeoutMs?: number
  readonly redactors?: readonly RegExp[]
  readonly onStdout?: (chunk: string) => void
  readonly onStderr?: (chunk: string) => void
}

export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
}

/**
 * Hands streamed output on in whole lines (newline included), so a secret split
 * across two chunks is still redacted before it reaches a listener.
 */
function lineEmitter(emit: (line: string) => void): { push(chunk: string): void; flush(): void } {
  let pending = ''
  return {
    push(chunk: string): void {
      pending += chunk
      let nl = pending.indexOf('\n')
      while (nl !== -1) {
        emit(pending.slice(0, nl + 1))
        pending = pending.slice(nl + 1)
        nl = pending.indexOf('\n')
      }
    },
    flush(): void {
      if (pending.length > 0) emit(pending)
      pending = ''
    }
  }
}

/** Runs programs directly (no shell), so arguments are never re-split or expanded. */
export class NodeProcessRunner implements ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const env: NodeJS.ProcessEnv | undefined = opts?.env !== undefined ? { ...process.env, ...opts.env } : undefined
    const nodeOpts: NodeSpawnOptions = { cwd: opts?.cwd, env, shell: false, windowsHide: true }
    const child = spawn(bin, [...args], nodeOpts)
    let stdout = ''
    let stderr = ''
    const apply = (s: string): string => redact(s, opts?.redactors)
    const outLines = lineEmitter((line) => opts?.onStdout?.(apply(line)))
    const errLines = lineEmitter((line) => opts?.onStderr?.(apply(line)))
    child.stdout?.on('data', (b: Buffer) => { const s = b.toString(); stdout += s; outLines.push(s) })
    child.stderr?.on('data', (b: Buffer) => { const s = b.toString(); stderr += s; errLines.push(s) })
    if (child.stdin) {
      // EPIPE when the program exits without reading its input
      child.stdin.on('error', (err: Error) => { stderr += `stdin: ${err.message}${EOL}` })
      if (typeof opts?.stdin === 'string') child.stdin.write(opts.stdin)
      child.stdin.end()
    }

    let timeoutTimer: NodeJS.Timeout | undefined
    if (opts?.timeoutMs !== undefined && opts.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        stderr += `${EOL}timed out after ${opts.timeoutMs}ms${EOL}`
        child.kill('SIGTERM')
      }, opts.timeoutMs)
    }

    return new Promise<ExecResult>((resolve) => {
      let settled = false
      const finish = (code: number | null): void => {
        if (settled) return
        settled = true
        if (timeoutTimer) clearTimeout(timeoutTimer)
        outLines.flush()
        errLines.flush()
        resolve({ ok: code === 0, code, stdout: apply(stdout), stderr: apply(stderr) })
      }
      child.on('error', (err: Error) => {
        stderr += `${err.message}${EOL}`
        finish(null)
      })
      child.on('close', (code: number | null) => { finish(code) })
    })
  }
}
