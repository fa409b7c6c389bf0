/**
 * The `rxv` command — argument parsing and the archive run.
 *
 * Takes its I/O, fetch and environment as arguments; src/cli.ts wires
 * them to the real process.
 */

import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { ArchiveOutcome, ServiceName } from '../schema/archive.js'
import { createDefaultRegistry, type ServiceRegistry } from '../services/registry.js'
import { loadConfig, type RxvConfig } from '../lib/config.js'
import { isExcludedUrl } from '../lib/url.js'
import { writeCsv } from './csv.js'
import { Archiver } from './dispatch.js'
import { ConfigError, RxvError } from './errors.js'
import type { FetchLike } from './fetch-with-timeout.js'
import { consoleLogger, silentLogger } from './logger.js'
import { buildSummary, writeSummary } from './summary.js'

export class UsageError extends RxvError {}

export interface CliArgs {
  urls: string[]
  /** Selected services, in the order their flags appeared */
  services: ServiceName[]
  all: boolean
  verbose: boolean
  list: boolean
  help: boolean
  outputDir: string | null
}

export interface CommandIo {
  stdout(line: string): void
  stderr(line: string): void
  readStdin(): Promise<string>
}

export interface CommandDeps {
  io: CommandIo
  fetch: FetchLike
  env: Record<string, string | undefined>
}

const SERVICE_FLAGS: Record<string, ServiceName> = {
  '--archivetoday': 'archivetoday',
  '--at': 'archivetoday',
  '--internetarchive': 'internetarchive',
  '--ia': 'internetarchive',
}

export const USAGE = `
Usage:
  rxv [urls...] [options]
  echo <url> | rxv [options]

Services:
  --archivetoday, --at        Submit to archive.today
  --internetarchive, --ia     Submit to the Internet Archive Wayback Machine
  --all, -a                   Submit to every service

Options:
  --output, -o <dir>          Write results.csv and summary.json to <dir>
  --verbose, -v               Log each request and a summary to stderr
  --list                      List services and their aliases
  --help, -h                  Show this message

Examples:
  rxv https://example.com --at --ia
  rxv http://example1.com http://example2.org --all
  cat urls.txt | rxv --ia -o results
`

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    urls: [],
    services: [],
    all: false,
    verbose: false,
    list: false,
    help: false,
    outputDir: null,
  }

  let positionalOnly = false
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (positionalOnly || !arg.startsWith('-')) {
      args.urls.push(arg)
      continue
    }

    const service = SERVICE_FLAGS[arg]
    if (service) {
      if (!args.services.includes(service)) args.services.push(service)
      continue
    }

    switch (arg) {
      case '--':
        positionalOnly = true
        break
      case '--all':
      case '-a':
        args.all = true
        break
      case '--verbose':
      case '-v':
        args.verbose = true
        break
      case '--list':
        args.list = true
        break
      case '--help':
      case '-h':
        args.help = true
        break
      case '--output':
      case '-o': {
        const dir = argv[i + 1]
        if (dir === undefined || dir.startsWith('-')) {
          throw new UsageError(`${arg} requires a directory`)
        }
        args.outputDir = dir
        i++
        break
      }
      default:
        throw new UsageError(`Unknown option: ${arg}`)
    }
  }

  return args
}

/** Split stdin into URLs, one per line */
export function parseUrlLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
}

export function formatOutcome(url: string, outcome: ArchiveOutcome): string {
  return outcome.ok
    ? `Archived URL (${outcome.service}): ${url} -> ${outcome.result.archiveUrl}`
    : `Failed to archive URL (${outcome.service}): ${url} (${outcome.error.message})`
}

function printServices(registry: ServiceRegistry, io: CommandIo) {
  io.stdout('Available services:')
  for (const entry of registry.entries()) {
    io.stdout(
      `  ${entry.canonicalName.padEnd(16)} ${entry.service.label.padEnd(18)} aliases: ${[...entry.aliases].join(', ')}`
    )
  }
}

/** Run the command; resolves to the process exit code */
export async function runCommand(argv: string[], deps: CommandDeps): Promise<number> {
  const { io } = deps

  let args: CliArgs
  try {
    args = parseArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.stderr(`Error: ${err.message}`)
    io.stderr(USAGE)
    return 1
  }

  if (args.help) {
    io.stdout(USAGE)
    return 0
  }

  let config: RxvConfig
  try {
    config = loadConfig(deps.env)
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    io.stderr(`Error: ${err.message}`)
    return 1
  }

  const logger = args.verbose ? consoleLogger(io.stderr) : silentLogger
  const registry = createDefaultRegistry({ ...config, fetch: deps.fetch, logger })

  if (args.list) {
    printServices(registry, io)
    return 0
  }

  // 1. Collect URLs
  const urls = args.urls.length > 0 ? args.urls : parseUrlLines(await io.readStdin())
  if (urls.length === 0) {
    io.stderr('Error: no URLs provided (pass them as arguments or on stdin, one per line)')
    return 1
  }

  // 2. Select services
  const services = args.all ? registry.entries().map(e => e.canonicalName) : args.services
  if (services.length === 0) {
    io.stderr('Error: no service selected (use --archivetoday/--at, --internetarchive/--ia or --all)')
    return 1
  }

  // 3. Skip URLs that already point at an archive
  const targets = urls.filter(url => {
    if (!isExcludedUrl(url)) return true
    io.stderr(`WARNING: Skipping archive URL: ${url}`)
    return false
  })
  if (targets.length === 0) {
    io.stderr('No URLs left to archive.')
    return 0
  }

  // 4. Archive, printing each outcome as it settles
  logger.info(`[rxv] Archiving ${targets.length} URL(s) with ${services.join(', ')}`)
  const archiver = new Archiver(registry, logger)
  const reports = await archiver.archiveUrls(targets, services, {
    onOutcome: (url, outcome) => io.stdout(formatOutcome(url, outcome)),
  })

  // 5. Write output files
  const summary = buildSummary(reports)
  if (args.outputDir) {
    mkdirSync(args.outputDir, { recursive: true })
    writeCsv(reports, join(args.outputDir, 'results.csv'))
    writeSummary(summary, join(args.outputDir, 'summary.json'))
    logger.info(`[rxv] Results written to ${args.outputDir}`)
  }

  if (args.verbose) {
    io.stderr('=== SUMMARY ===')
    io.stderr(`  Succeeded: ${summary.succeeded}`)
    io.stderr(`  Failed: ${summary.failed}`)
  }

  return summary.failed > 0 ? 1 : 0
}
