import type { ContainerEngine, BuildSpec } from '../../src/core/release/engine'
import type { Notifier } from '../../src/core/release/orchestrator'
import type { ExecOptions, ExecResult, ProcessRunner } from '../../src/utils/process'
import type { Credentials, Environment } from '../../src/types/release'
import { NotificationFailure } from '../../src/utils/errors'

export const OK: ExecResult = { ok: true, code: 0, stdout: '', stderr: '' }

export function failed(stderr: string): ExecResult {
  return { ok: false, code: 1, stdout: '', stderr }
}

/**
 * Records engine calls as short labels ('login', 'pull app:latest', 'build app:v1', ...).
 * `fail(label, times)` makes the next `times` calls with that label fail.
 */
export class FakeEngine implements ContainerEngine {
  readonly name = 'docker'
  readonly calls: string[] = []
  readonly logins: Credentials[] = []
  readonly builds: BuildSpec[] = []
  private readonly failures = new Map<string, { times: number; stderr: string }>()

  fail(label: string, times: number, stderr = 'simulated failure'): this {
    this.failures.set(label, { times, stderr })
    return this
  }

  private record(label: string): Promise<ExecResult> {
    this.calls.push(label)
    const f = this.failures.get(label)
    if (f && f.times > 0) {
      f.times--
      return Promise.resolve(failed(f.stderr))
    }
    return Promise.resolve(OK)
  }

  login(credentials: Credentials): Promise<ExecResult> { this.logins.push(credentials); return this.record('login') }
  logout(): Promise<ExecResult> { return this.record('logout') }
  pull(ref: string): Promise<ExecResult> { return this.record(`pull ${ref}`) }
  build(spec: BuildSpec): Promise<ExecResult> { this.builds.push(spec); return this.record(`build ${spec.image}:${spec.tag}`) }
  push(ref: string): Promise<ExecResult> { return this.record(`push ${ref}`) }
}

export class FakeNotifier implements Notifier {
  readonly calls: { environment: Environment; image: string; tag: string }[] = []
  private readonly failing = new Set<string>()

  failFor(image: string): this { this.failing.add(image); return this }

  notify(environment: Environment, image: string, tag: string): Promise<number> {
    this.calls.push({ environment, image, tag })
    if (this.failing.has(image)) return Promise.reject(new NotificationFailure(image, 'Bad credentials', 401))
    return Promise.resolve(204)
  }
}

/** Answers `bin args...` command lines from a table; anything else fails. */
export class ScriptedRunner implements ProcessRunner {
  readonly calls: { bin: string; args: readonly string[]; opts?: ExecOptions }[] = []

  constructor(private readonly table: Readonly<Record<string, ExecResult>>) {}

  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    this.calls.push({ bin, args, opts })
    const res = this.table[[bin, ...args].join(' ')]
    return Promise.resolve(res ?? failed(`unexpected command: ${bin} ${args.join(' ')}`))
  }
}

export function gitRunner(opts: { readonly exactTag?: string; readonly describe?: string }): ScriptedRunner {
  return new ScriptedRunner({
    'git tag --points-at HEAD': { ...OK, stdout: opts.exactTag !== undefined ? `${opts.exactTag}\n` : '' },
    'git describe --always --tags': opts.describe !== undefined ? { ...OK, stdout: `${opts.describe}\n` } : failed('fatal: not a git repository')
  })
}
