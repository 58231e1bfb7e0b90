import { logger } from '../../utils/logger'
import { errorMessage, TransientExternalFailure, type ErrorInfo } from '../../utils/errors'

/** Anything that reports success the way a finished process does. */
export interface Outcome {
  readonly ok: boolean
  readonly stderr?: string
}

export interface AttemptEvent {
  readonly label: string
  readonly attempt: number
  readonly ok: boolean
  readonly detail?: string
}

export interface RetryOptions {
  /** Observes every attempt, e.g. to stream NDJSON events. */
  readonly onAttempt?: (evt: AttemptEvent) => void
  /** Turns the last failure output into a code and remedy for the fatal error. */
  readonly explain?: (detail: string) => ErrorInfo
}

const ATTEMPTS = 2

/**
 * Runs a fallible external step at most twice, back to back.
 * A second failure throws {@link TransientExternalFailure}; callers do not continue past it.
 * Steps must be safe to re-run: the first attempt may have partly happened.
 */
export class RetryExecutor {
  constructor(private readonly opts: RetryOptions = {}) {}

  async execute<T extends Outcome>(label: string, action: () => Promise<T>): Promise<T> {
    let detail = ''
    for (let attempt = 1; attempt <= ATTEMPTS; attempt++) {
      try {
        const res: T = await action()
        if (res.ok) {
          this.opts.onAttempt?.({ label, attempt, ok: true })
          return res
        }
        detail = (res.stderr ?? '').trim()
      } catch (err) {
        detail = errorMessage(err)
      }
      this.opts.onAttempt?.({ label, attempt, ok: false, detail })
      if (attempt < ATTEMPTS) logger.warn(`${label} failed, retrying (attempt ${attempt + 1}/${ATTEMPTS})`)
    }
    throw new TransientExternalFailure(label, ATTEMPTS, lastLine(detail), this.opts.explain?.(detail))
  }
}

function lastLine(s: string): string {
  const lines = s.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0)
  return lines[lines.length - 1] ?? ''
}
