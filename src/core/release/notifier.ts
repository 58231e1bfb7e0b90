import { logger } from '../../utils/logger'
import { errorMessage, NotificationFailure } from '../../utils/errors'
import type { DispatchConfig } from '../../types/config'
import type { DeployRequest, Environment } from '../../types/release'

export const DISPATCH_ACCEPT = 'application/vnd.github.v3+json'

export interface DispatchBody {
  readonly event_type: string
  readonly client_payload: {
    readonly environment: string
    readonly image: string
    readonly tag: string
  }
}

export type FetchLike = (url: string, init: {
  readonly method: string
  readonly headers: Readonly<Record<string, string>>
  readonly body: string
  readonly signal?: AbortSignal
}) => Promise<{ readonly ok: boolean; readonly status: number; text(): Promise<string> }>

export interface NotifierOptions {
  readonly dispatch: DispatchConfig
  readonly token: string
  readonly fetch?: FetchLike
  readonly timeoutMs?: number
}

export function dispatchBody(req: DeployRequest, dispatch: Pick<DispatchConfig, 'eventType' | 'environments'>): DispatchBody {
  return {
    event_type: dispatch.eventType,
    client_payload: {
      environment: dispatch.environments[req.environment],
      image: req.image,
      tag: req.tag
    }
  }
}

export function basicAuth(username: string, token: string): string {
  return `Basic ${Buffer.from(`${username}:${token}`, 'utf8').toString('base64')}`
}

/** Announces a pushed image to the dispatch endpoint. One attempt per call. */
export class DeployNotifier {
  private readonly fetchFn: FetchLike

  constructor(private readonly opts: NotifierOptions) {
    this.fetchFn = opts.fetch ?? fetch
  }

  /** Resolves with the HTTP status; throws {@link NotificationFailure} when not accepted. */
  async notify(environment: Environment, image: string, tag: string): Promise<number> {
    const body: DispatchBody = dispatchBody({ environment, image, tag }, this.opts.dispatch)
    logger.debug(`POST ${this.opts.dispatch.url} ${JSON.stringify(body)}`)
    let res: Awaited<ReturnType<FetchLike>>
    try {
      res = await this.fetchFn(this.opts.dispatch.url, {
        method: 'POST',
        headers: {
          Accept: DISPATCH_ACCEPT,
          Authorization: basicAuth(this.opts.dispatch.username, this.opts.token),
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000)
      })
    } catch (err) {
      throw new NotificationFailure(image, errorMessage(err))
    }
    if (!res.ok) {
      let text = ''
      try {
        text = (await res.text()).trim()
      } catch (err) {
        logger.debug(`Could not read dispatch response body: ${errorMessage(err)}`)
      }
      throw new NotificationFailure(image, text.length > 0 ? text.slice(0, 500) : 'request rejected', res.status)
    }
    return res.status
  }
}
