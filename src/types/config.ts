import type { BuildTarget, Environment } from './release'

/** Shape of `shipwright.config.json` as written on disk. */
export interface ReleaseConfigFile {
  /** Container engine binary, e.g. docker or podman. */
  readonly engine?: string
  /** Build argument that receives the release tag. */
  readonly buildArg?: string
  readonly registry?: {
    /** Registry host; omitted means the engine default (Docker Hub). */
    readonly server?: string
    readonly usernameEnv?: string
    readonly passwordEnv?: string
  }
  readonly targets: readonly {
    readonly image: string
    readonly dockerfile?: string
    readonly context?: string
  }[]
  readonly dispatch: {
    readonly url: string
    readonly username: string
    readonly tokenEnv?: string
    readonly eventType?: string
    /** Names the receiver expects for each environment. */
    readonly environments?: {
      readonly qa?: string
      readonly prod?: string
    }
  }
}

export interface RegistryConfig {
  readonly server?: string
  readonly usernameEnv: string
  readonly passwordEnv: string
}

export interface DispatchConfig {
  readonly url: string
  readonly username: string
  readonly tokenEnv: string
  readonly eventType: string
  readonly environments: Readonly<Record<Environment, string>>
}

/** Config with defaults applied. */
export interface ReleaseConfig {
  readonly engine: string
  readonly buildArg: string
  readonly registry: RegistryConfig
  readonly targets: readonly BuildTarget[]
  readonly dispatch: DispatchConfig
}
