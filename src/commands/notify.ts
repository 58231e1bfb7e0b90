import { Command } from 'commander'
import { resolve } from 'node:path'
import { logger } from '../utils/logger'
import { computeRedactors } from '../utils/redaction'
import { ConfigError, errorMessage, NotificationFailure } from '../utils/errors'
import { loadConfig, resolveDispatchToken } from '../core/config/load'
import { loadEnv, type EnvRecord } from '../core/config/env'
import { DeployNotifier, type FetchLike } from '../core/release/notifier'
import type { Environment, NotificationReport } from '../types/release'

export interface NotifyOptions {
  readonly image?: string
  readonly tag?: string
  readonly env?: string
  readonly config?: string
  readonly envFile?: string
  readonly cwd?: string
  readonly json?: boolean
}

function isEnvironment(val: string | undefined): val is Environment {
  return val === 'qa' || val === 'prod'
}

/**
 * Send a single deploy notification, e.g. to repeat one that failed during `release`.
 * Only images configured as targets may be announced.
 */
export async function notifyRun(opts: NotifyOptions, deps: { readonly fetch?: FetchLike; readonly env?: EnvRecord } = {}): Promise<NotificationReport> {
  const cwd: string = resolve(opts.cwd ?? process.cwd())
  if (!isEnvironment(opts.env)) throw new ConfigError(`--env must be qa or prod (got ${opts.env ?? 'nothing'})`)
  if (!opts.image) throw new ConfigError('--image is required')
  if (!opts.tag) throw new ConfigError('--tag is required')
  const environment: Environment = opts.env
  const config = await loadConfig(cwd, opts.config)
  const image: string = opts.image
  if (!config.targets.some(t => t.image === image)) {
    throw new ConfigError(`${image} is not a configured target (${config.targets.map(t => t.image).join(', ')})`)
  }
  const env: EnvRecord = await loadEnv({ cwd, envFile: opts.envFile, base: deps.env })
  const token: string = resolveDispatchToken(config, env)
  logger.addRedactors(computeRedactors({ secrets: [token], basicAuth: [[config.dispatch.username, token]] }))
  const notifier = new DeployNotifier({ dispatch: config.dispatch, token, fetch: deps.fetch })
  let report: NotificationReport
  try {
    const status: number = await notifier.notify(environment, image, opts.tag)
    report = { environment, image, tag: opts.tag, ok: true, status }
    logger.success(`Deploy of ${image}:${opts.tag} requested on ${environment} (HTTP ${status})`)
  } catch (err) {
    const failure = err instanceof NotificationFailure ? err : new NotificationFailure(image, errorMessage(err))
    report = { environment, image, tag: opts.tag, ok: false, status: failure.status, error: failure.detail }
    logger.error(failure.message)
    process.exitCode = 1
  }
  if (logger.isJsonOnly()) logger.json({ action: 'notify', ...report, final: true })
  return report
}

export function registerNotifyCommand(program: Command): void {
  program
    .command('notify')
    .description('Request a deploy of one pushed image (single attempt)')
    .requiredOption('--image <name>', 'Configured target image')
    .requiredOption('--tag <tag>', 'Image tag to deploy')
    .requiredOption('--env <env>', 'Environment: qa | prod')
    .option('--config <path>', 'Path to shipwright.config.json (relative to --cwd)')
    .option('--env-file <path>', 'Load the dispatch token from this .env file')
    .option('--cwd <dir>', 'Directory holding the config (defaults to the current directory)')
    .option('--json', 'Output JSON summary only')
    .action(async (opts: NotifyOptions): Promise<void> => {
      try {
        if (opts.json === true) logger.setJsonOnly(true)
        await notifyRun(opts)
      } catch (err) {
        logger.error(errorMessage(err))
        process.exitCode = 1
      }
    })
}
