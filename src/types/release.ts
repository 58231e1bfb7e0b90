/** Deployment environment chosen for a whole run. */
export type Environment = 'qa' | 'prod'

/** Resolved once per run; read-only afterwards. */
export interface ReleaseContext {
  /** Exact tag on HEAD, or the `git describe` fallback. */
  readonly tag: string
  readonly isTaggedRelease: boolean
}

export interface BuildTarget {
  readonly image: string
  readonly dockerfilePath: string
  /** Build context directory. */
  readonly context: string
}

export interface Credentials {
  readonly username: string
  readonly password: string
}

export interface DeployRequest {
  readonly environment: Environment
  readonly image: string
  readonly tag: string
}

export type PipelineState =
  | 'Init'
  | 'AuthenticatedBuilding'
  | 'LoggedOut'
  | 'Notifying'
  | 'Done'
  | 'Failed'

export interface TargetReport {
  readonly image: string
  readonly ok: boolean
  readonly error?: string
}

export interface NotificationReport {
  readonly environment: Environment
  readonly image: string
  readonly tag: string
  readonly ok: boolean
  readonly status?: number
  readonly error?: string
}
