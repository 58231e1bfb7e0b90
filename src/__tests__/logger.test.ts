import { describe, it, expect, vi, beforeEach } from 'vitest'
import { readFile, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from '../utils/logger'
import { setColorMode } from '../utils/colors'

const SECRET = 'test-secret'

async function waitForFile(path: string, tries = 20, delayMs = 25): Promise<void> {
  for (let i = 0; i < tries; i++) {
    try { await stat(path); return } catch { /* not written yet */ }
    await new Promise(r => setTimeout(r, delayMs))
  }
}

describe('logger output', () => {
  beforeEach(() => {
    setColorMode('never')
    logger.setNoEmoji(true)
  })

  it('prefixes levels in ASCII when --no-emoji', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.info('Building acme/web')
    logger.success('Pushed')
    expect(log.mock.calls.map(c => c[0])).toEqual(['[info] Building acme/web', '[info] [ok] Pushed'])
  })

  it('sends errors to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.error('Boom')
    expect(err.mock.calls[0]?.[0]).toBe('[error] Boom')
  })

  it('prints green success with emoji when colours are forced', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    setColorMode('always')
    logger.setNoEmoji(false)
    logger.success('All good')
    expect(log.mock.calls[0]?.[0]).toBe('ℹ \u001b[32m✓ All good\u001b[39m')
  })

  it('hides debug until verbose and everything but errors when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.debug('$ docker pull acme/web:latest')
    logger.setLevel('debug')
    logger.debug('$ docker pull acme/web:latest')
    logger.setLevel('error')
    logger.info('hidden')
    logger.warn('hidden')
    expect(log.mock.calls.map(c => c[0])).toEqual(['[debug] $ docker pull acme/web:latest'])
  })

  it('suppresses human logs in JSON mode but still prints JSON', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setJsonOnly(true)
    logger.info('hidden')
    logger.json({ ok: true })
    expect(log.mock.calls.map(c => c[0])).toEqual(['{\n  "ok": true\n}'])
  })
})

describe('logger redaction', () => {
  beforeEach(() => {
    setColorMode('never')
    logger.setNoEmoji(true)
    logger.setRedactors([SECRET])
  })

  it('redacts secrets in human logs', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.info(`password=${SECRET}`)
    expect(log.mock.calls[0]?.[0]).toBe('[info] password=******')
  })

  it('redacts JSON console output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.json({ token: SECRET })
    expect(log.mock.calls[0]?.[0]).toBe('{\n  "token": "******"\n}')
  })

  it('streams events to the console only in NDJSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.event({ action: 'release', phase: 'state' })
    logger.setNdjson(true)
    logger.event({ action: 'release', phase: 'notify', message: SECRET })
    expect(log.mock.calls.map(c => c[0])).toEqual(['{"action":"release","phase":"notify","message":"******"}'])
  })

  it('redacts the NDJSON file sink', async () => {
    const p = join(tmpdir(), `shipwright-test-${Date.now()}.ndjson`)
    try {
      logger.setNdjsonFile(p)
      logger.event({ token: SECRET })
      await waitForFile(p)
      await new Promise(r => setTimeout(r, 25))
      expect(await readFile(p, 'utf8')).toBe('{"token":"******"}\n')
    } finally {
      await rm(p, { force: true })
    }
  })

  it('adds redactors without dropping earlier ones', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.addRedactors(['other-secret'])
    logger.info(`${SECRET} other-secret`)
    expect(log.mock.calls[0]?.[0]).toBe('[info] ****** ******')
  })
})
