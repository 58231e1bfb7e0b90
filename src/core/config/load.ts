import { join } from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import { fsx } from '../../utils/fs'
import { ConfigError, errorMessage } from '../../utils/errors'
import { releaseConfigSchema } from '../../schemas/release-config.schema'
import type { ReleaseConfig, ReleaseConfigFile } from '../../types/config'
import type { Credentials } from '../../types/release'
import type { EnvRecord } from './env'

export const CONFIG_FILE = 'shipwright.config.json'

export const defaults = {
  engine: 'docker',
  buildArg: 'FROM_TAG',
  dockerfile: 'Dockerfile',
  context: '.',
  usernameEnv: 'DOCKER_USERNAME',
  passwordEnv: 'DOCKER_PASSWORD',
  tokenEnv: 'RELEASE_BOT_TOKEN',
  eventType: 'deploy'
} as const

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateFile = ajv.compile<ReleaseConfigFile>(releaseConfigSchema)

/** Apply defaults to an already validated config file. */
export function resolveConfig(file: ReleaseConfigFile): ReleaseConfig {
  const seen = new Set<string>()
  for (const t of file.targets) {
    if (seen.has(t.image)) throw new ConfigError(`Duplicate target image: ${t.image}`)
    seen.add(t.image)
  }
  return {
    engine: file.engine ?? defaults.engine,
    buildArg: file.buildArg ?? defaults.buildArg,
    registry: {
      server: file.registry?.server,
      usernameEnv: file.registry?.usernameEnv ?? defaults.usernameEnv,
      passwordEnv: file.registry?.passwordEnv ?? defaults.passwordEnv
    },
    targets: file.targets.map(t => ({
      image: t.image,
      dockerfilePath: t.dockerfile ?? defaults.dockerfile,
      context: t.context ?? defaults.context
    })),
    dispatch: {
      url: file.dispatch.url,
      username: file.dispatch.username,
      tokenEnv: file.dispatch.tokenEnv ?? defaults.tokenEnv,
      eventType: file.dispatch.eventType ?? defaults.eventType,
      environments: {
        qa: file.dispatch.environments?.qa ?? 'qa',
        prod: file.dispatch.environments?.prod ?? 'prod'
      }
    }
  }
}

export function parseConfig(data: unknown, source: string): ReleaseConfig {
  if (!validateFile(data)) {
    const errs: string[] = (validateFile.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    throw new ConfigError(`Invalid config ${source}: ${errs.join('; ')}`)
  }
  return resolveConfig(data)
}

export async function loadConfig(cwd: string, file?: string): Promise<ReleaseConfig> {
  const path: string = join(cwd, file ?? CONFIG_FILE)
  let data: unknown
  try {
    data = await fsx.readJson(path)
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON: ${path} (${errorMessage(err)})`)
  }
  if (data === undefined) throw new ConfigError(`Config not found: ${path}`)
  return parseConfig(data, path)
}

function required(env: EnvRecord, name: string, purpose: string): string {
  const val: string | undefined = env[name]
  if (val === undefined || val.length === 0) throw new ConfigError(`Missing ${purpose}: set ${name} in the environment or an env file`)
  return val
}

export function resolveCredentials(config: ReleaseConfig, env: EnvRecord): Credentials {
  return {
    username: required(env, config.registry.usernameEnv, 'registry username'),
    password: required(env, config.registry.passwordEnv, 'registry password')
  }
}

export function resolveDispatchToken(config: ReleaseConfig, env: EnvRecord): string {
  return required(env, config.dispatch.tokenEnv, 'dispatch token')
}
