import { mapEngineError } from '../../utils/errors'
import type { ProcessRunner } from '../../utils/process'
import type { ReleaseConfig } from '../../types/config'
import type { ReleaseContext } from '../../types/release'
import type { ReleaseEvent } from '../events/types'
import { evt } from '../events/emit'
import { Authenticator } from './authenticator'
import { environmentFor } from './context'
import { CliContainerEngine, engineArgs, imageRef, LATEST, type ContainerEngine } from './engine'
import { ImageBuilder } from './image-builder'
import { DeployNotifier, dispatchBody, type DispatchBody, type FetchLike } from './notifier'
import { PipelineOrchestrator, type Notifier } from './orchestrator'
import { RetryExecutor } from './retry'

export interface PipelineWiring {
  readonly config: ReleaseConfig
  readonly cwd: string
  readonly token: string
  readonly runner?: ProcessRunner
  readonly engine?: ContainerEngine
  readonly notifier?: Notifier
  readonly fetch?: FetchLike
  readonly redactors?: readonly RegExp[]
  readonly onEvent?: (e: ReleaseEvent) => void
}

/** Assemble an orchestrator from config. Tests pass their own engine or notifier. */
export function createReleasePipeline(w: PipelineWiring): PipelineOrchestrator {
  const engine: ContainerEngine = w.engine ?? (() => {
    if (!w.runner) throw new Error('createReleasePipeline needs a process runner or an engine')
    return new CliContainerEngine(w.runner, { bin: w.config.engine, cwd: w.cwd, redactors: w.redactors })
  })()
  const retry = new RetryExecutor({
    onAttempt: (a) => w.onEvent?.(evt({ phase: 'step', step: a.label, attempt: a.attempt, ok: a.ok, message: a.detail })),
    explain: (detail) => mapEngineError(engine.name, detail)
  })
  const notifier: Notifier = w.notifier ?? new DeployNotifier({ dispatch: w.config.dispatch, token: w.token, fetch: w.fetch })
  return new PipelineOrchestrator({
    authenticator: new Authenticator(engine, retry, w.config.registry.server),
    builder: new ImageBuilder(engine, retry, w.config.buildArg),
    notifier,
    onEvent: w.onEvent
  })
}

export interface ReleasePlan {
  readonly tag: string
  readonly isTaggedRelease: boolean
  readonly environment: 'qa' | 'prod'
  /** Engine command lines in execution order; the password goes over stdin and never appears. */
  readonly commands: readonly string[]
  readonly notifications: readonly { readonly url: string; readonly body: DispatchBody }[]
}

export function planRelease(config: ReleaseConfig, context: ReleaseContext, username: string): ReleasePlan {
  const bin = config.engine
  const line = (args: readonly string[]): string => `${bin} ${args.join(' ')}`
  const commands: string[] = [line(engineArgs.login(username, config.registry.server))]
  for (const t of config.targets) {
    const latest = imageRef(t.image, LATEST)
    const tagged = imageRef(t.image, context.tag)
    commands.push(
      line(engineArgs.pull(latest)),
      line(engineArgs.build({ image: t.image, tag: context.tag, dockerfilePath: t.dockerfilePath, context: t.context, buildArg: config.buildArg })),
      line(engineArgs.push(tagged)),
      line(engineArgs.push(latest))
    )
  }
  commands.push(line(engineArgs.logout(config.registry.server)))
  const environment = environmentFor(context)
  return {
    tag: context.tag,
    isTaggedRelease: context.isTaggedRelease,
    environment,
    commands,
    notifications: config.targets.map(t => ({
      url: config.dispatch.url,
      body: dispatchBody({ environment, image: t.image, tag: context.tag }, config.dispatch)
    }))
  }
}

export { resolveReleaseContext, environmentFor } from './context'
export { RetryExecutor } from './retry'
export { PipelineOrchestrator } from './orchestrator'
export { DeployNotifier } from './notifier'
