import { logger } from '../../utils/logger'
import type { ExecResult, ProcessRunner } from '../../utils/process'
import type { Credentials } from '../../types/release'

export interface BuildSpec {
  readonly image: string
  readonly tag: string
  readonly dockerfilePath: string
  readonly context: string
  readonly buildArg: string
}

/** The registry and image operations a release needs; one call per external invocation. */
export interface ContainerEngine {
  readonly name: string
  login(credentials: Credentials, server?: string): Promise<ExecResult>
  logout(server?: string): Promise<ExecResult>
  pull(ref: string): Promise<ExecResult>
  build(spec: BuildSpec): Promise<ExecResult>
  push(ref: string): Promise<ExecResult>
}

export const LATEST = 'latest'

export function imageRef(image: string, tag: string): string {
  return `${image}:${tag}`
}

/** Argument vectors for the docker-compatible CLI (docker, podman). */
export const engineArgs = {
  login: (username: string, server?: string): readonly string[] =>
    ['login', '--username', username, '--password-stdin', ...(server ? [server] : [])],
  logout: (server?: string): readonly string[] => ['logout', ...(server ? [server] : [])],
  pull: (ref: string): readonly string[] => ['pull', ref],
  build: (spec: BuildSpec): readonly string[] => [
    'build',
    '-t', imageRef(spec.image, LATEST),
    '-t', imageRef(spec.image, spec.tag),
    '-f', spec.dockerfilePath,
    '--build-arg', `${spec.buildArg}=${spec.tag}`,
    '--cache-from', imageRef(spec.image, LATEST),
    spec.context
  ],
  push: (ref: string): readonly string[] => ['push', ref]
} as const

export interface CliEngineOptions {
  /** Executable name or path. */
  readonly bin: string
  readonly cwd: string
  readonly redactors?: readonly RegExp[]
  readonly timeoutMs?: number
}

function streamLines(prefix: string): (chunk: string) => void {
  return (chunk: string): void => {
    for (const line of chunk.split(/\r?\n/)) if (line.trim().length > 0) logger.debug(`${prefix} ${line}`)
  }
}

export class CliContainerEngine implements ContainerEngine {
  public readonly name: string

  constructor(private readonly runner: ProcessRunner, private readonly opts: CliEngineOptions) {
    this.name = opts.bin
  }

  private run(args: readonly string[], stdin?: string): Promise<ExecResult> {
    logger.debug(`$ ${this.opts.bin} ${args.join(' ')}`)
    const out = streamLines(`[${this.opts.bin}]`)
    return this.runner.exec(this.opts.bin, args, {
      cwd: this.opts.cwd,
      stdin,
      timeoutMs: this.opts.timeoutMs,
      redactors: this.opts.redactors,
      onStdout: out,
      onStderr: out
    })
  }

  login(credentials: Credentials, server?: string): Promise<ExecResult> {
    return this.run(engineArgs.login(credentials.username, server), credentials.password)
  }

  logout(server?: string): Promise<ExecResult> {
    return this.run(engineArgs.logout(server))
  }

  pull(ref: string): Promise<ExecResult> {
    return this.run(engineArgs.pull(ref))
  }

  build(spec: BuildSpec): Promise<ExecResult> {
    return this.run(engineArgs.build(spec))
  }

  push(ref: string): Promise<ExecResult> {
    return this.run(engineArgs.push(ref))
  }
}
