import { logger } from '../../utils/logger'
import { errorMessage, NotificationFailure, TransientExternalFailure } from '../../utils/errors'
import { environmentFor } from './context'
import { evt, summary } from '../events/emit'
import type { Authenticator } from './authenticator'
import type { ImageBuilder } from './image-builder'
import type { ReleaseEvent, ReleaseSummary } from '../events/types'
import type {
  BuildTarget,
  Credentials,
  Environment,
  NotificationReport,
  PipelineState,
  ReleaseContext,
  TargetReport
} from '../../types/release'

export interface Notifier {
  notify(environment: Environment, image: string, tag: string): Promise<number>
}

export interface OrchestratorDeps {
  readonly authenticator: Authenticator
  readonly builder: ImageBuilder
  readonly notifier: Notifier
  readonly onEvent?: (e: ReleaseEvent) => void
  readonly now?: () => number
}

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  Init: ['AuthenticatedBuilding', 'Failed'],
  AuthenticatedBuilding: ['LoggedOut', 'Failed'],
  LoggedOut: ['Notifying', 'Failed'],
  Notifying: ['Done', 'Failed'],
  Done: [],
  Failed: []
}

interface RunState {
  readonly context: ReleaseContext
  readonly environment: Environment
  readonly started: number
  readonly targets: TargetReport[]
  readonly notifications: NotificationReport[]
}

/**
 * Drives one release: login, build and push every target in order, logout,
 * then notify the dispatch endpoint once per target.
 *
 * Any step that exhausts its retry fails the run. Once logged in, a failed
 * build still triggers a logout before the run reports `Failed`.
 * Notification failures are collected but never fail the run.
 */
export class PipelineOrchestrator {
  private current: PipelineState = 'Init'
  private readonly now: () => number

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now
  }

  get state(): PipelineState { return this.current }

  async run(context: ReleaseContext, credentials: Credentials, targets: readonly BuildTarget[]): Promise<ReleaseSummary> {
    if (this.current !== 'Init') throw new Error(`Pipeline already ran (state ${this.current})`)
    const rs: RunState = { context, environment: environmentFor(context), started: this.now(), targets: [], notifications: [] }
    const { authenticator, builder } = this.deps

    logger.section(`Release ${context.tag}`)
    logger.info(`Logging into registry`)
    try {
      await authenticator.login(credentials)
    } catch (err) {
      return this.fail(rs, err)
    }
    this.transition('AuthenticatedBuilding')

    for (const target of targets) {
      logger.info(`Building ${target.image}:${context.tag} from ${target.dockerfilePath}`)
      try {
        await builder.buildAndPush(target, context)
      } catch (err) {
        rs.targets.push({ image: target.image, ok: false, error: errorMessage(err) })
        await this.cleanupLogout()
        return this.fail(rs, err)
      }
      rs.targets.push({ image: target.image, ok: true })
      logger.success(`Pushed ${target.image}:${context.tag} and ${target.image}:latest`)
    }

    logger.info('Logging out of registry')
    try {
      await authenticator.logout()
    } catch (err) {
      return this.fail(rs, err)
    }
    this.transition('LoggedOut')

    this.transition('Notifying')
    for (const target of targets) await this.notifyOne(rs, target.image)

    this.transition('Done')
    const failed = rs.notifications.filter(n => !n.ok).length
    if (failed > 0) logger.warn(`${failed} of ${rs.notifications.length} deploy notifications failed; images were pushed`)
    else logger.success(`Release ${context.tag} announced to ${rs.environment}`)
    return this.finish(rs, true)
  }

  private async notifyOne(rs: RunState, image: string): Promise<void> {
    const { environment, context } = rs
    try {
      const status: number = await this.deps.notifier.notify(environment, image, context.tag)
      rs.notifications.push({ environment, image, tag: context.tag, ok: true, status })
      this.emit(evt({ phase: 'notify', image, environment, ok: true, status }))
      logger.info(`Deploy of ${image}:${context.tag} requested on ${environment}`)
    } catch (err) {
      // Any notifier error is reported; the remaining targets are still announced
      const failure = err instanceof NotificationFailure ? err : new NotificationFailure(image, errorMessage(err))
      rs.notifications.push({ environment, image, tag: context.tag, ok: false, status: failure.status, error: failure.detail })
      this.emit(evt({ phase: 'notify', image, environment, ok: false, status: failure.status, message: failure.message }))
      logger.error(failure.message)
    }
  }

  private async cleanupLogout(): Promise<void> {
    if (!this.deps.authenticator.active) return
    try {
      await this.deps.authenticator.logout()
    } catch (err) {
      logger.error(`Cleanup logout failed: ${errorMessage(err)}`)
    }
  }

  private fail(rs: RunState, err: unknown): ReleaseSummary {
    this.transition('Failed')
    const message: string = errorMessage(err)
    logger.error(message)
    if (err instanceof TransientExternalFailure) {
      if (err.remedy) logger.note(err.remedy)
      return this.finish(rs, false, { error: message, code: err.code, remedy: err.remedy })
    }
    return this.finish(rs, false, { error: message })
  }

  private finish(rs: RunState, ok: boolean, extra: { readonly error?: string; readonly code?: string; readonly remedy?: string } = {}): ReleaseSummary {
    const state: 'Done' | 'Failed' = ok ? 'Done' : 'Failed'
    this.emit(evt({ phase: 'done', state, ok, message: extra.error }))
    return summary({
      ok,
      state,
      tag: rs.context.tag,
      isTaggedRelease: rs.context.isTaggedRelease,
      environment: rs.environment,
      targets: rs.targets,
      notifications: rs.notifications,
      ...extra,
      durationMs: Math.max(0, Math.round(this.now() - rs.started))
    })
  }

  private transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) throw new Error(`Invalid pipeline transition ${this.current} -> ${next}`)
    logger.debug(`state ${this.current} -> ${next}`)
    this.current = next
    this.emit(evt({ phase: 'state', state: next }))
  }

  private emit(e: ReleaseEvent): void {
    this.deps.onEvent?.(e)
  }
}
