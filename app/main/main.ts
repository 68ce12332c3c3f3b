import { parseArgs } from 'node:util'
import log from 'electron-log/node'
import type { AppSettings, LogLevel } from './types'
import { SettingsManager, LogLevelSchema } from './SettingsManager'
import { loadCatalog } from './catalog'
import { runExportVerification } from './workflow'

export const EXIT_OK = 0
export const EXIT_UNHEALTHY = 1
export const EXIT_FATAL = 2

const USAGE = `Usage: export-verifier [exportDir] [options]

Compares a folder of exported CSV files against the reference catalog.

Options:
  --catalog <path>       Reference catalog JSON (default: bundled catalog)
  --artifacts <dir>      Directory for report.json and summary.csv
  --settings <path>      Settings file (default: ./export-verifier.settings.json)
  --log-level <level>    error | warn | info | verbose | debug
  --allow-placeholders   Placeholder values do not affect the exit status
  --allow-unexpected     Files missing from the catalog do not affect the exit status
  --init-settings        Write the effective settings file and exit
  -h, --help             Show this help`

export interface CliOptions {
  help: boolean
  initSettings: boolean
  settingsPath: string | undefined
  overrides: Partial<AppSettings>
}

/**
 * Parse command-line arguments into settings overrides
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      catalog: { type: 'string' },
      artifacts: { type: 'string' },
      settings: { type: 'string' },
      'log-level': { type: 'string' },
      'allow-placeholders': { type: 'boolean' },
      'allow-unexpected': { type: 'boolean' },
      'init-settings': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  })

  if (positionals.length > 1) {
    throw new Error(`Expected at most one export directory, got ${positionals.length}`)
  }

  let logLevel: LogLevel | undefined
  if (values['log-level'] !== undefined) {
    const parsed = LogLevelSchema.safeParse(values['log-level'])
    if (!parsed.success) {
      throw new Error(`Invalid log level: ${values['log-level']}`)
    }
    logLevel = parsed.data
  }

  const overrides: Partial<AppSettings> = {
    exportDir: positionals[0],
    catalogPath: values.catalog,
    artifactDir: values.artifacts,
    logLevel,
    failOnPlaceholders: values['allow-placeholders'] ? false : undefined,
    failOnUnexpected: values['allow-unexpected'] ? false : undefined
  }

  return {
    help: values.help ?? false,
    initSettings: values['init-settings'] ?? false,
    settingsPath: values.settings,
    overrides
  }
}

function configureLogging(level: LogLevel): void {
  log.transports.console.level = level
  log.transports.console.format = '{text}'
  log.transports.file.level = level
}

export function main(argv: string[] = process.argv.slice(2)): number {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (error) {
    log.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`)
    log.info(USAGE)
    return EXIT_FATAL
  }

  if (options.help) {
    log.info(USAGE)
    return EXIT_OK
  }

  try {
    const settingsManager = new SettingsManager(options.settingsPath)
    settingsManager.applyOverrides(options.overrides)
    const settings = settingsManager.getSettings()
    configureLogging(settings.logLevel)

    if (options.initSettings) {
      settingsManager.saveSettings()
      log.info(`[SETTINGS] Wrote ${settingsManager.getSettingsPath()}`)
      return EXIT_OK
    }

    // The catalog must be valid before any comparison begins
    const catalog = loadCatalog(settings.catalogPath)

    const run = runExportVerification({
      exportDir: settings.exportDir,
      artifactDir: settings.artifactDir,
      catalog,
      failOnPlaceholders: settings.failOnPlaceholders,
      failOnUnexpected: settings.failOnUnexpected
    })

    return run.healthy ? EXIT_OK : EXIT_UNHEALTHY
  } catch (error) {
    log.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`)
    return EXIT_FATAL
  }
}
