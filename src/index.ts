#!/usr/bin/env node
import { Command } from 'commander'
import { logger } from './utils/logger'
import { isColorMode, setColorMode } from './utils/colors'
import { registerPlanCommand, registerReleaseCommand } from './commands/release'
import { registerNotifyCommand } from './commands/notify'

const VERSION: string = '0.1.0'

function flagValue(argv: readonly string[], flag: string): string | undefined {
  const ix = argv.findIndex((a) => a === flag)
  if (ix === -1) return undefined
  const val = argv[ix + 1]
  return val !== undefined && !val.startsWith('-') ? val : undefined
}

function main(): void {
  const program: Command = new Command()
  program.name('shipwright')
  program.description('Build, push and announce container image releases')
  program.version(VERSION)
  // Global options (parsed by Commander, but applied pre-parse so early logs honour them)
  program.option('--verbose', 'Verbose output, including engine output')
  program.option('--json', 'JSON-only output (suppresses human logs)')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--ndjson', 'Newline-delimited JSON event streaming (implies --json)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.option('--ndjson-file <path>', 'Also append NDJSON events to this file')
  const argv: readonly string[] = process.argv
  if (argv.includes('--verbose')) logger.setLevel('debug')
  if (argv.includes('--quiet')) logger.setLevel('error')
  if (argv.includes('--json')) logger.setJsonOnly(true)
  if (argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (argv.includes('--ndjson')) logger.setNdjson(true)
  if (argv.includes('--timestamps')) logger.setTimestamps(true)
  const ndjsonFile = flagValue(argv, '--ndjson-file')
  if (ndjsonFile !== undefined) logger.setNdjsonFile(ndjsonFile)
  const color = flagValue(argv, '--color') ?? process.env.SHW_COLOR ?? 'auto'
  setColorMode(isColorMode(color) ? color : 'auto')
  registerReleaseCommand(program)
  registerPlanCommand(program)
  registerNotifyCommand(program)
  program.parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

main()
