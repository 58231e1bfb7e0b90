import { describe, it, expect } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig, parseConfig, resolveCredentials, resolveDispatchToken } from '../core/config/load'
import { loadEnv } from '../core/config/env'
import { ConfigError } from '../utils/errors'

async function withTemp<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'shw-config-'))
  try { return await fn(dir) } finally { await rm(dir, { recursive: true, force: true }) }
}

const minimal = {
  targets: [{ image: 'acme/web' }, { image: 'acme/worker', dockerfile: 'Dockerfile.worker' }],
  dispatch: { url: 'https://api.example.test/dispatches', username: 'acme-bot' }
}

describe('parseConfig', () => {
  it('applies defaults in target order', () => {
    const cfg = parseConfig(minimal, 'inline')
    expect(cfg).toEqual({
      engine: 'docker',
      buildArg: 'FROM_TAG',
      registry: { server: undefined, usernameEnv: 'DOCKER_USERNAME', passwordEnv: 'DOCKER_PASSWORD' },
      targets: [
        { image: 'acme/web', dockerfilePath: 'Dockerfile', context: '.' },
        { image: 'acme/worker', dockerfilePath: 'Dockerfile.worker', context: '.' }
      ],
      dispatch: {
        url: 'https://api.example.test/dispatches',
        username: 'acme-bot',
        tokenEnv: 'RELEASE_BOT_TOKEN',
        eventType: 'deploy',
        environments: { qa: 'qa', prod: 'prod' }
      }
    })
  })

  it('rejects an empty target list', () => {
    expect(() => parseConfig({ ...minimal, targets: [] }, 'inline')).toThrow('Invalid config inline: /targets must NOT have fewer than 1 items')
  })

  it('rejects image names that already carry a tag', () => {
    expect(() => parseConfig({ ...minimal, targets: [{ image: 'acme/web:latest' }] }, 'inline')).toThrow(ConfigError)
  })

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...minimal, dockerfile: 'x' }, 'inline')).toThrow('must NOT have additional properties')
  })

  it('rejects duplicate target images', () => {
    expect(() => parseConfig({ ...minimal, targets: [{ image: 'acme/web' }, { image: 'acme/web' }] }, 'inline'))
      .toThrow('Duplicate target image: acme/web')
  })
})

describe('loadConfig', () => {
  it('reads shipwright.config.json from the directory', async () => {
    await withTemp(async (dir) => {
      await writeFile(join(dir, 'shipwright.config.json'), JSON.stringify({ ...minimal, engine: 'podman' }), 'utf8')
      const cfg = await loadConfig(dir)
      expect(cfg.engine).toBe('podman')
      expect(cfg.targets.map(t => t.image)).toEqual(['acme/web', 'acme/worker'])
    })
  })

  it('names the missing file', async () => {
    await withTemp(async (dir) => {
      await expect(loadConfig(dir, 'release.json')).rejects.toThrow(`Config not found: ${join(dir, 'release.json')}`)
    })
  })

  it('reports malformed JSON as a config error', async () => {
    await withTemp(async (dir) => {
      await writeFile(join(dir, 'shipwright.config.json'), '{ "targets": ', 'utf8')
      await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigError)
    })
  })
})

describe('secrets', () => {
  const cfg = parseConfig(minimal, 'inline')

  it('reads credentials and token from the named variables', () => {
    const env = { DOCKER_USERNAME: 'ci-bot', DOCKER_PASSWORD: 'test-password', RELEASE_BOT_TOKEN: 'test-token' }
    expect(resolveCredentials(cfg, env)).toEqual({ username: 'ci-bot', password: 'test-password' })
    expect(resolveDispatchToken(cfg, env)).toBe('test-token')
  })

  it('names the missing variable', () => {
    expect(() => resolveCredentials(cfg, { DOCKER_USERNAME: 'ci-bot' }))
      .toThrow('Missing registry password: set DOCKER_PASSWORD in the environment or an env file')
  })
})

describe('loadEnv', () => {
  it('layers .env < .env.local < base environment < --env-file', async () => {
    await withTemp(async (dir) => {
      await writeFile(join(dir, '.env'), 'A=env\nB=env\nC=env\nD=env\n', 'utf8')
      await writeFile(join(dir, '.env.local'), 'B=local\nC=local\nD=local\n', 'utf8')
      await writeFile(join(dir, 'ci.env'), 'D=file\n', 'utf8')
      const env = await loadEnv({ cwd: dir, envFile: 'ci.env', base: { C: 'process', D: 'process' } })
      expect(env).toEqual({ A: 'env', B: 'local', C: 'process', D: 'file' })
    })
  })

  it('fails when the explicit env file is missing', async () => {
    await withTemp(async (dir) => {
      await expect(loadEnv({ cwd: dir, envFile: 'missing.env', base: {} })).rejects.toThrow(`Env file not found: ${join(dir, 'missing.env')}`)
    })
  })
})
