import { describe, it, expect, vi } from 'vitest'
import { RetryExecutor, type AttemptEvent } from '../core/release/retry'
import { TransientExternalFailure } from '../utils/errors'
import { OK, failed } from '../../tests/helpers/fakes'

describe('RetryExecutor', () => {
  it('returns the first success without retrying', async () => {
    const action = vi.fn(async () => OK)
    const res = await new RetryExecutor().execute('pull app:latest', action)
    expect(res.ok).toBe(true)
    expect(action).toHaveBeenCalledTimes(1)
  })

  it('succeeds after exactly two invocations when the first attempt fails', async () => {
    const action = vi.fn()
      .mockResolvedValueOnce(failed('net/http: TLS handshake timeout'))
      .mockResolvedValueOnce(OK)
    const res = await new RetryExecutor().execute('push app:v1', action)
    expect(res).toEqual(OK)
    expect(action).toHaveBeenCalledTimes(2)
  })

  it('invokes an always-failing action exactly twice, then throws', async () => {
    const action = vi.fn(async () => failed('first line\ndenied: requested access to the resource is denied\n'))
    const run = new RetryExecutor().execute('push app:v1', action)
    await expect(run).rejects.toBeInstanceOf(TransientExternalFailure)
    await expect(run).rejects.toMatchObject({
      step: 'push app:v1',
      attempts: 2,
      detail: 'denied: requested access to the resource is denied',
      message: 'push app:v1 failed after 2 attempts: denied: requested access to the resource is denied'
    })
    expect(action).toHaveBeenCalledTimes(2)
  })

  it('treats a thrown error like a failed result', async () => {
    const action = vi.fn()
      .mockRejectedValueOnce(new Error('spawn docker ENOENT'))
      .mockResolvedValueOnce(OK)
    await new RetryExecutor().execute('login', action)
    expect(action).toHaveBeenCalledTimes(2)
  })

  it('reports every attempt and explains the final failure', async () => {
    const seen: AttemptEvent[] = []
    const retry = new RetryExecutor({
      onAttempt: (a) => seen.push(a),
      explain: () => ({ code: 'DOCKER_AUTH_FAILED', message: 'auth', remedy: 'check credentials' })
    })
    const err = await retry.execute('login', async () => failed('unauthorized')).catch((e: unknown) => e)
    expect(seen).toEqual([
      { label: 'login', attempt: 1, ok: false, detail: 'unauthorized' },
      { label: 'login', attempt: 2, ok: false, detail: 'unauthorized' }
    ])
    expect(err).toBeInstanceOf(TransientExternalFailure)
    expect(err).toMatchObject({ code: 'DOCKER_AUTH_FAILED', remedy: 'check credentials' })
  })
})
