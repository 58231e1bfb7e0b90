/**
 * Event and summary types for NDJSON streaming and final outputs.
 */
import type { Environment, NotificationReport, PipelineState, TargetReport } from '../../types/release'

export type ReleasePhase = 'context' | 'state' | 'step' | 'notify' | 'done'

/** NDJSON event (streaming). Consumed by CI logs and dashboards. */
export interface ReleaseEvent {
  readonly action: 'release'
  readonly phase: ReleasePhase
  readonly state?: PipelineState
  readonly step?: string // e.g. 'login', 'push app/web:v1.2.3'
  readonly attempt?: number
  readonly ok?: boolean
  readonly image?: string
  readonly environment?: Environment
  readonly status?: number
  readonly message?: string
}

/** Final JSON summary, one per `release` run. */
export interface ReleaseSummary {
  readonly ok: boolean
  readonly action: 'release'
  readonly state: 'Done' | 'Failed'
  readonly tag: string
  readonly isTaggedRelease: boolean
  readonly environment: Environment
  readonly targets: readonly TargetReport[]
  readonly notifications: readonly NotificationReport[]
  readonly error?: string
  readonly code?: string
  readonly remedy?: string
  readonly durationMs: number
  readonly final: true
}
