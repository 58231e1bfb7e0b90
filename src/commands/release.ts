import { Command } from 'commander'
import { resolve } from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import { logger } from '../utils/logger'
import { computeRedactors } from '../utils/redaction'
import { NodeProcessRunner, type ProcessRunner } from '../utils/process'
import { errorMessage } from '../utils/errors'
import { loadConfig, resolveCredentials, resolveDispatchToken } from '../core/config/load'
import { loadEnv, type EnvRecord } from '../core/config/env'
import { createReleasePipeline, planRelease, resolveReleaseContext, type ReleasePlan } from '../core/release'
import { evt } from '../core/events/emit'
import { releaseSummarySchema } from '../schemas/release-summary.schema'
import type { ContainerEngine } from '../core/release/engine'
import type { FetchLike } from '../core/release/notifier'
import type { ReleaseSummary } from '../core/events/types'
import type { ReleaseConfig } from '../types/config'
import type { ReleaseContext } from '../types/release'

export interface ReleaseOptions {
  readonly config?: string
  readonly envFile?: string
  readonly cwd?: string
  readonly dryRun?: boolean
  readonly json?: boolean
}

/** Seams for tests; production runs use the defaults. */
export interface ReleaseDeps {
  readonly runner?: ProcessRunner
  readonly engine?: ContainerEngine
  readonly fetch?: FetchLike
  /** Replaces process.env as the base environment. */
  readonly env?: EnvRecord
}

/** Exit status when a pipeline step exhausts its retry. */
export const EXIT_PIPELINE_FAILED = 2

interface Prepared {
  readonly cwd: string
  readonly config: ReleaseConfig
  readonly env: EnvRecord
  readonly runner: ProcessRunner
  readonly context: ReleaseContext
}

async function prepare(opts: ReleaseOptions, deps: ReleaseDeps): Promise<Prepared> {
  const cwd: string = resolve(opts.cwd ?? process.cwd())
  const config: ReleaseConfig = await loadConfig(cwd, opts.config)
  const env: EnvRecord = await loadEnv({ cwd, envFile: opts.envFile, base: deps.env })
  const runner: ProcessRunner = deps.runner ?? new NodeProcessRunner()
  const context: ReleaseContext = await resolveReleaseContext(runner, cwd)
  logger.event(evt({ phase: 'context', message: context.tag, ok: context.isTaggedRelease }))
  logger.info(`Version ${logger.highlight(context.tag, 'bold')} (${context.isTaggedRelease ? 'tagged release' : 'untagged build'})`)
  return { cwd, config, env, runner, context }
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateSummary = ajv.compile(releaseSummarySchema)

export function annotate(obj: ReleaseSummary): ReleaseSummary & { readonly schemaOk: boolean; readonly schemaErrors: readonly string[] } {
  const ok: boolean = validateSummary(obj)
  const errs: string[] = (validateSummary.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
  return { ...obj, schemaOk: ok, schemaErrors: errs }
}

function printPlan(plan: ReleasePlan): void {
  if (logger.isJsonOnly()) { logger.json({ action: 'plan', ...plan, final: true }); return }
  logger.section(`Plan for ${plan.tag} → ${plan.environment}`)
  plan.commands.forEach((c, i) => logger.info(`${String(i + 1).padStart(2, ' ')}. ${c}`))
  for (const n of plan.notifications) logger.info(`POST ${n.url} ${JSON.stringify(n.body)}`)
}

function printSummary(s: ReleaseSummary): void {
  logger.section(s.ok ? 'Release complete' : 'Release failed')
  for (const t of s.targets) {
    if (t.ok) logger.success(`${t.image}:${s.tag}`)
    else logger.error(`${t.image}: ${t.error ?? 'failed'}`)
  }
  for (const n of s.notifications) {
    if (n.ok) logger.success(`notified ${n.environment} for ${n.image}`)
    else logger.warn(`notification for ${n.image} failed${n.status !== undefined ? ` (HTTP ${n.status})` : ''}`)
  }
  logger.info(`Duration: ${(s.durationMs / 1000).toFixed(1)}s`)
}

/** Print the command plan for the current commit without running anything. */
export async function planRun(opts: ReleaseOptions, deps: ReleaseDeps = {}): Promise<ReleasePlan> {
  const p = await prepare(opts, deps)
  const username: string = p.env[p.config.registry.usernameEnv] ?? `<${p.config.registry.usernameEnv}>`
  const plan: ReleasePlan = planRelease(p.config, p.context, username)
  printPlan(plan)
  return plan
}

/**
 * Run the full release. Sets `process.exitCode` to {@link EXIT_PIPELINE_FAILED}
 * when a step fails after its retry; notification failures leave it untouched.
 */
export async function releaseRun(opts: ReleaseOptions, deps: ReleaseDeps = {}): Promise<ReleaseSummary | ReleasePlan> {
  if (opts.dryRun === true) return planRun(opts, deps)
  const p = await prepare(opts, deps)
  const credentials = resolveCredentials(p.config, p.env)
  const token: string = resolveDispatchToken(p.config, p.env)
  const redactors: RegExp[] = computeRedactors({
    secrets: [credentials.password, token],
    basicAuth: [[credentials.username, credentials.password], [p.config.dispatch.username, token]]
  })
  logger.addRedactors(redactors)
  const pipeline = createReleasePipeline({
    config: p.config,
    cwd: p.cwd,
    token,
    runner: p.runner,
    engine: deps.engine,
    fetch: deps.fetch,
    redactors,
    onEvent: (e) => logger.event(e)
  })
  const result: ReleaseSummary = await pipeline.run(p.context, credentials, p.config.targets)
  const annotated = annotate(result)
  if (logger.isJsonOnly()) logger.json(annotated)
  else printSummary(result)
  if (!result.ok) process.exitCode = EXIT_PIPELINE_FAILED
  return result
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--config <path>', 'Path to shipwright.config.json (relative to --cwd)')
    .option('--env-file <path>', 'Load secrets from this .env file (wins over the environment)')
    .option('--cwd <dir>', 'Repository root to build from (defaults to the current directory)')
    .option('--json', 'Output JSON summary only')
}

export function registerReleaseCommand(program: Command): void {
  withCommonOptions(program
    .command('release')
    .description('Log in, build and push every target, log out, then request deploys'))
    .option('--dry-run', 'Print the command plan without executing it')
    .action(async (opts: ReleaseOptions): Promise<void> => {
      try {
        if (opts.json === true) logger.setJsonOnly(true)
        await releaseRun(opts)
      } catch (err) {
        logger.error(errorMessage(err))
        process.exitCode = 1
      }
    })
}

export function registerPlanCommand(program: Command): void {
  withCommonOptions(program
    .command('plan')
    .description('Resolve the version and show the commands and notifications a release would run'))
    .action(async (opts: ReleaseOptions): Promise<void> => {
      try {
        if (opts.json === true) logger.setJsonOnly(true)
        await planRun(opts)
      } catch (err) {
        logger.error(errorMessage(err))
        process.exitCode = 1
      }
    })
}
