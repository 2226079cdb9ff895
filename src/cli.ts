import { existsSync } from 'fs'
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'
import type { Driver } from './services/drivers'
import { runFleetAudit } from './services/fleet'
import {
  Logger,
  RotatingFileSink,
  consoleSink,
  expandLogFileName,
  isLevelEnabled,
  parseLogLevel,
  type LogSink,
} from './services/logger'
import { renderFleetReport } from './services/report'
import { loadRules, type LoggingRules } from './services/rules'
import { errorMessage, type LogLevel } from './services/types'

export interface CliOptions {
  hostsFile: string
  rulesFile: string
  fix: boolean
  logLevel: string
  maxConcurrent?: number
}

export interface CliDeps {
  driver?: Driver
  signal?: AbortSignal
  stdout?: (line: string) => void  // Report output
  consoleLog?: LogSink  // Replaces the console log sink
}

const EXAMPLES = `
Examples:
  # Check EVPN status on all devices
  evpn-audit --hosts-file data/hosts.yaml --rules-file data/rules.yaml

  # Check status and fix rejected routes
  evpn-audit --hosts-file data/hosts.yaml --rules-file data/rules.yaml --fix

  # Enable debug logging (rules file uses default)
  evpn-audit --hosts-file data/hosts.yaml --log-level DEBUG
`

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

export function createProgram(): Command {
  return new Command()
    .name('evpn-audit')
    .description('EVPN Route Status Manager for Juniper devices')
    .option('--hosts-file <path>', 'YAML file containing device inventory', 'data/hosts.yaml')
    .option('--rules-file <path>', 'YAML file with EVPN validation rules', 'data/rules.yaml')
    .option('--fix', 'Restart routing on devices with rejected routes', false)
    .addOption(
      new Option('--log-level <level>', 'Logging level')
        .choices(['DEBUG', 'INFO', 'WARNING', 'ERROR'])
        .default('INFO')
    )
    .option(
      '--max-concurrent <count>',
      'Maximum concurrent device connections (overrides rules file setting)',
      parsePositiveInt
    )
    .addHelpText('after', EXAMPLES)
}

function lowerLevel(a: LogLevel, b: LogLevel): LogLevel {
  return isLevelEnabled(a, b) ? b : a
}

// File logging from the rules document; the console keeps the CLI level
export function setupLoggingFromRules(logger: Logger, consoleOutput: LogSink, logging: LoggingRules | null) {
  if (!logging?.enabled) return

  const fileLevel = parseLogLevel(logging.level) ?? 'info'
  const filePath = expandLogFileName(logging.file)
  logger.addSink(new RotatingFileSink(filePath, logging.max_size_mb * 1024 * 1024, logging.backup_count, fileLevel))
  if (!logging.console) logger.removeSink(consoleOutput)
  logger.setLevel(lowerLevel(logger.minLevel, fileLevel))

  logger.info(`Logging configured: ${fileLevel.toUpperCase()} level to ${filePath}`)
}

export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.stdout ?? ((line: string) => console.log(line))
  const program = createProgram().exitOverride()
  if (deps.stdout) {
    program.configureOutput({ writeOut: text => print(text.trimEnd()), writeErr: text => print(text.trimEnd()) })
  }

  try {
    await program.parseAsync(argv)
  } catch (err) {
    // --help, unknown options and invalid values
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  const opts = program.opts<CliOptions>()

  const consoleLevel = parseLogLevel(opts.logLevel) ?? 'info'
  const consoleOutput = deps.consoleLog ?? consoleSink()
  consoleOutput.minLevel = consoleLevel
  const logger = new Logger([consoleOutput], consoleLevel)

  if (!existsSync(opts.hostsFile)) {
    print(`Error: Hosts file '${opts.hostsFile}' not found`)
    return 1
  }
  if (!existsSync(opts.rulesFile)) {
    print(`Error: Rules file '${opts.rulesFile}' not found`)
    return 1
  }

  try {
    const rules = loadRules(opts.rulesFile, logger.fn)
    setupLoggingFromRules(logger, consoleOutput, rules.logging)

    const { summary, report } = await runFleetAudit({
      hostsFile: opts.hostsFile,
      rules,
      fixMode: opts.fix,
      maxConcurrent: opts.maxConcurrent,
      logger,
      driver: deps.driver,
      signal: deps.signal,
    })

    if (!report) {
      logger.error('No devices loaded')
      return 0
    }

    for (const line of renderFleetReport(report)) print(line)

    if (summary.aborted) {
      print('')
      print('Operation interrupted by user')
      return 1
    }
    return 0
  } catch (err) {
    print(`Unexpected error: ${errorMessage(err)}`)
    logger.error(`Unexpected error: ${err instanceof Error && err.stack ? err.stack : errorMessage(err)}`)
    return 1
  }
}
