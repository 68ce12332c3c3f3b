import path from 'node:path'
import * as fs from 'fs'
import { z } from 'zod'
import log from 'electron-log/node'
import type { AppSettings } from './types'

export const SETTINGS_FILE_NAME = 'export-verifier.settings.json'

export const DEFAULT_SETTINGS: AppSettings = {
  exportDir: 'downloaded exported files',
  catalogPath: null,
  artifactDir: 'artifacts',
  logLevel: 'info',
  failOnPlaceholders: true,
  failOnUnexpected: true
}

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug'])

const SettingsFileSchema = z
  .object({
    exportDir: z.string().min(1),
    catalogPath: z.string().min(1).nullable(),
    artifactDir: z.string().min(1),
    logLevel: LogLevelSchema,
    failOnPlaceholders: z.boolean(),
    failOnUnexpected: z.boolean()
  })
  .partial()
  .strict()

export function defaultSettingsPath(): string {
  return process.env['EXPORT_VERIFIER_SETTINGS'] || path.join(process.cwd(), SETTINGS_FILE_NAME)
}

export class SettingsManager {
  private settingsPath: string
  private settings: AppSettings

  constructor(settingsPath: string = defaultSettingsPath()) {
    this.settingsPath = settingsPath
    this.settings = this.loadSettings()
  }

  private loadSettings(): AppSettings {
    try {
      if (fs.existsSync(this.settingsPath)) {
        const data = fs.readFileSync(this.settingsPath, 'utf-8')
        const parsed = SettingsFileSchema.safeParse(JSON.parse(data))
        if (!parsed.success) {
          const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          log.error(`[SETTINGS] Ignoring invalid settings in ${this.settingsPath}: ${issues.join('; ')}`)
          return { ...DEFAULT_SETTINGS }
        }

        // Merge with defaults to ensure all fields exist
        return {
          ...DEFAULT_SETTINGS,
          ...parsed.data
        }
      }
    } catch (error) {
      log.error('[ERROR] Failed to load settings:', error)
    }

    return { ...DEFAULT_SETTINGS }
  }

  getSettingsPath(): string {
    return this.settingsPath
  }

  getSettings(): AppSettings {
    return { ...this.settings }
  }

  /**
   * Apply command-line overrides for this run only
   */
  applyOverrides(overrides: Partial<AppSettings>): void {
    const defined = Object.fromEntries(
      Object.entries(overrides).filter(([, value]) => value !== undefined)
    )
    const parsed = SettingsFileSchema.parse(defined)
    this.settings = {
      ...this.settings,
      ...parsed
    }
  }

  saveSettings(): void {
    try {
      fs.mkdirSync(path.dirname(this.settingsPath), { recursive: true })
      fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2), 'utf-8')
    } catch (error) {
      log.error('[ERROR] Failed to save settings:', error)
      throw error
    }
  }
}
