export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

/** A registry/engine step that still failed after its retry. Always fatal to the run. */
export class TransientExternalFailure extends Error {
  public readonly code: string
  public readonly remedy?: string

  constructor(
    public readonly step: string,
    public readonly attempts: number,
    public readonly detail: string,
    info?: ErrorInfo
  ) {
    super(`${step} failed after ${attempts} attempts${detail.length > 0 ? `: ${detail}` : ''}`)
    this.name = 'TransientExternalFailure'
    this.code = info?.code ?? 'EXTERNAL_STEP_FAILED'
    this.remedy = info?.remedy
  }
}

/** A deploy notification that was not accepted. Reported, never fatal. */
export class NotificationFailure extends Error {
  constructor(
    public readonly image: string,
    public readonly detail: string,
    public readonly status?: number
  ) {
    super(`notification for ${image} failed${status !== undefined ? ` (HTTP ${status})` : ''}: ${detail}`)
    this.name = 'NotificationFailure'
  }
}

/** Invalid or incomplete configuration, detected before anything runs. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/** Map raw container engine output to a stable code and a remedy hint. */
export function mapEngineError(engine: string, raw: string): ErrorInfo {
  const txt = normalize(raw)
  const prefix = engine.toUpperCase()
  if (txt.includes('cannot connect to the docker daemon') || txt.includes('is the docker daemon running') || txt.includes('cannot connect to podman')) {
    return {
      code: `${prefix}_DAEMON_UNAVAILABLE`,
      message: 'The container engine daemon is not reachable.',
      remedy: `Start the ${engine} daemon and check that the current user may access its socket.`
    }
  }
  if (txt.includes('incorrect username or password') || txt.includes('unauthorized') || txt.includes('authentication required')) {
    return {
      code: `${prefix}_AUTH_FAILED`,
      message: 'Registry authentication failed.',
      remedy: 'Check the registry username/password variables named in the config.'
    }
  }
  if (txt.includes('requested access to the resource is denied') || txt.includes('denied:')) {
    return {
      code: `${prefix}_ACCESS_DENIED`,
      message: 'The registry refused access to the repository.',
      remedy: 'Verify the account has push rights on the image repository.'
    }
  }
  if (txt.includes('manifest unknown') || txt.includes('not found: manifest') || (txt.includes('pull access denied') && txt.includes('does not exist'))) {
    return {
      code: `${prefix}_IMAGE_NOT_FOUND`,
      message: 'The image to pull does not exist in the registry.',
      remedy: 'Push an initial image once; the pull step uses it as build cache.'
    }
  }
  if (txt.includes('no such file or directory') && txt.includes('dockerfile')) {
    return {
      code: `${prefix}_DOCKERFILE_MISSING`,
      message: 'The build file could not be found.',
      remedy: 'Check the target\'s dockerfile path in the config.'
    }
  }
  if (txt.includes('enoent') || txt.includes('command not found')) {
    return {
      code: `${prefix}_NOT_INSTALLED`,
      message: `The ${engine} executable was not found.`,
      remedy: `Install ${engine} or set "engine" in the config.`
    }
  }
  if (txt.includes('toomanyrequests') || txt.includes('rate limit')) {
    return {
      code: `${prefix}_RATE_LIMITED`,
      message: 'The registry rate limit was hit.',
      remedy: 'Wait and re-run, or authenticate with an account that has a higher pull limit.'
    }
  }
  if (txt.includes('timeout') || txt.includes('etimedout') || txt.includes('econnreset') || txt.includes('tls handshake')) {
    return {
      code: 'NETWORK_ERROR',
      message: 'A network error occurred while talking to the registry.',
      remedy: 'Re-run the release. If it persists, check connectivity or registry status.'
    }
  }
  return {
    code: `${prefix}_UNKNOWN_ERROR`,
    message: raw.trim() || 'Unknown engine error.'
  }
}
