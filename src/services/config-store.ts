import Conf, { type Schema } from 'conf'

import { DEFAULT_BAUD_RATE } from './measurement-protocol'

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const configStoreSchema: Schema<ConfigStoreSchema> = {
  serialPort: {
    type: 'string',
  },
  baudRate: {
    type: 'integer',
    minimum: 1,
  },
  exportDirectory: {
    type: 'string',
  },
  csvLocale: {
    type: 'string',
  },
  logLevel: {
    type: 'string',
    enum: [...LOG_LEVELS],
  },
}

/**
 * Config store schema
 * Persisted acquisition settings
 */
export type ConfigStoreSchema = {
  /**
   * Serial device path of the instrument (e.g. /dev/ttyUSB0, COM3)
   */
  serialPort?: string
  /**
   * Serial speed. The instrument ships at 9600 baud.
   */
  baudRate: number
  /**
   * Directory receiving dscout.csv and dscout.py
   */
  exportDirectory?: string
  /**
   * Locale for CSV number formatting. Unset means the system locale.
   */
  csvLocale?: string
  /**
   *
   */
  logLevel: LogLevel
}

/**
 * Settings in effect for one run (stored values with command-line overrides applied).
 */
export interface AcquisitionSettings {
  serialPort: string | null
  baudRate: number
  exportDirectory: string
  csvLocale: string | undefined
  logLevel: LogLevel
}

export type SettingsOverrides = Partial<Omit<AcquisitionSettings, 'serialPort'>> & {
  serialPort?: string
}

const configDefaults: Pick<ConfigStoreSchema, 'baudRate' | 'logLevel'> = {
  baudRate: DEFAULT_BAUD_RATE,
  logLevel: 'info',
}

/**
 * A stored or overridden setting that cannot be used.
 */
export class InvalidSettingError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'InvalidSettingError'
  }
}

let storeInstance: Conf<ConfigStoreSchema> | null = null

/**
 * Create a config store.
 * @param cwd - Directory holding config.json. Defaults to the OS config directory of the project.
 */
export function createConfigStore(cwd?: string): Conf<ConfigStoreSchema> {
  return new Conf<ConfigStoreSchema>({
    projectName: 'diodescout-console',
    cwd,
    configName: 'config',
    schema: configStoreSchema,
    defaults: configDefaults,
  })
}

/**
 * Get the config store instance (lazy initialization on first use).
 */
export function getConfigStore(): Conf<ConfigStoreSchema> {
  if (!storeInstance) {
    storeInstance = createConfigStore()
  }
  return storeInstance
}

/**
 *
 * @param value
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Whether a string is a well-formed BCP 47 locale tag (e.g. "de-DE", not "de_DE").
 * @param value
 */
export function isLocaleTag(value: string): boolean {
  try {
    return Intl.getCanonicalLocales(value).length === 1
  } catch {
    return false
  }
}

/**
 * Merge command-line overrides over stored settings.
 * @param store
 * @param overrides
 * @param cwd - Fallback export directory
 * @throws {InvalidSettingError} When the CSV locale is not a locale tag
 */
export function resolveAcquisitionSettings(
  store: Conf<ConfigStoreSchema>,
  overrides: SettingsOverrides = {},
  cwd: string = process.cwd()
): AcquisitionSettings {
  const csvLocale = overrides.csvLocale ?? store.get('csvLocale')
  if (csvLocale !== undefined && !isLocaleTag(csvLocale)) {
    throw new InvalidSettingError(`Invalid CSV locale: ${csvLocale}`)
  }

  return {
    serialPort: overrides.serialPort ?? store.get('serialPort') ?? null,
    baudRate: overrides.baudRate ?? store.get('baudRate'),
    exportDirectory: overrides.exportDirectory ?? store.get('exportDirectory') ?? cwd,
    csvLocale,
    logLevel: overrides.logLevel ?? store.get('logLevel'),
  }
}
