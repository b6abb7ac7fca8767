import * as fs from 'fs/promises'
import * as path from 'path'
import { parseArgs } from 'util'

import { computeAxisRanges } from './services/axis-scaling'
import {
  type AcquisitionSettings,
  getConfigStore,
  isLocaleTag,
  isLogLevel,
  resolveAcquisitionSettings,
  type SettingsOverrides,
} from './services/config-store'
import { setupLogService } from './services/log-service'
import { MeasurementDataManager } from './services/measurement-data-manager'
import type { ExportResult } from './services/measurement-export'
import {
  ConnectionState,
  type SeriesCompletedEvent,
  SerialAcquisitionController,
} from './services/serial-acquisition-controller'

export const CSV_EXPORT_NAME = 'dscout.csv'
export const PYTHON_EXPORT_NAME = 'dscout.py'

const USAGE = `Usage:
  diodescout record [--port <path>] [--baud <n>] [--out-dir <dir>] [--locale <tag>] [--log-level <level>]
  diodescout replay <capture-file> [--out-dir <dir>] [--locale <tag>] [--log-level <level>]`

/**
 *
 */
export class UsageError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Command selected on the command line.
 */
export type ParsedCommand =
  | { command: 'help' }
  | { command: 'record'; overrides: SettingsOverrides }
  | { command: 'replay'; captureFile: string; overrides: SettingsOverrides }

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 *
 * @param argv - Arguments after the script name
 */
export function parseCommandLine(argv: string[]): ParsedCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string' },
      baud: { type: 'string' },
      'out-dir': { type: 'string' },
      locale: { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  const [command, ...rest] = positionals
  if (values.help || command === undefined) {
    return { command: 'help' }
  }

  const overrides: SettingsOverrides = {}
  if (values.port !== undefined) {
    overrides.serialPort = values.port
  }
  if (values.baud !== undefined) {
    const baudRate = Number(values.baud)
    if (!Number.isInteger(baudRate) || baudRate <= 0) {
      throw new UsageError(`Invalid baud rate: ${values.baud}`)
    }
    overrides.baudRate = baudRate
  }
  if (values['out-dir'] !== undefined) {
    overrides.exportDirectory = path.resolve(values['out-dir'])
  }
  if (values.locale !== undefined) {
    if (!isLocaleTag(values.locale)) {
      throw new UsageError(`Invalid locale: ${values.locale}`)
    }
    overrides.csvLocale = values.locale
  }
  if (values['log-level'] !== undefined) {
    const level = values['log-level']
    if (!isLogLevel(level)) {
      throw new UsageError(`Invalid log level: ${level}`)
    }
    overrides.logLevel = level
  }

  if (command === 'record') {
    return { command, overrides }
  }

  if (command === 'replay') {
    const [captureFile] = rest
    if (captureFile === undefined) {
      throw new UsageError('replay needs a capture file')
    }
    return { command, captureFile, overrides }
  }

  throw new UsageError(`Unknown command: ${command}`)
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Export every completed series to dscout.csv and dscout.py.
 * @param manager
 * @param settings
 */
export async function exportAll(
  manager: MeasurementDataManager,
  settings: Pick<AcquisitionSettings, 'exportDirectory' | 'csvLocale'>
): Promise<ExportResult[]> {
  if (manager.seriesCount() === 0) {
    console.warn('[DiodeScout] No completed series, exporting empty files')
  }

  await fs.mkdir(settings.exportDirectory, { recursive: true })

  const csvPath = path.join(settings.exportDirectory, CSV_EXPORT_NAME)
  const pythonPath = path.join(settings.exportDirectory, PYTHON_EXPORT_NAME)

  return [
    await manager.exportCSV(csvPath, { locale: settings.csvLocale }),
    await manager.exportPython(pythonPath),
  ]
}

/**
 * Feed a raw capture file through the parser and export the result.
 * @param captureFile
 * @param settings
 */
export async function replayCapture(
  captureFile: string,
  settings: Pick<AcquisitionSettings, 'exportDirectory' | 'csvLocale'>
): Promise<ExportResult[]> {
  const data = await fs.readFile(captureFile)
  const manager = new MeasurementDataManager()
  const completed = manager.processReceivedData(data)

  console.log(`[DiodeScout] Replayed ${data.length} bytes from ${captureFile}: ${completed} series completed`)
  if (manager.isReceiving()) {
    console.warn(`[DiodeScout] Capture ends inside a series (${manager.tempSeriesSize()} points discarded)`)
  }

  return exportAll(manager, settings)
}

/**
 * Resolves on SIGINT/SIGTERM or when the port goes away.
 * @param controller
 */
function waitForStop(controller: SerialAcquisitionController): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop)
      process.off('SIGTERM', stop)
      controller.off('state-change', onStateChange)
      resolve()
    }
    const onStateChange = (state: ConnectionState): void => {
      if (state === ConnectionState.DISCONNECTED) {
        stop()
      }
    }

    process.on('SIGINT', stop)
    process.on('SIGTERM', stop)
    controller.on('state-change', onStateChange)
  })
}

/**
 * Listen on the instrument until interrupted, then export.
 * @param settings
 */
export async function record(settings: AcquisitionSettings): Promise<ExportResult[]> {
  if (!settings.serialPort) {
    throw new UsageError('No serial port configured. Pass --port or set serialPort in the config store.')
  }

  const controller = new SerialAcquisitionController()
  const manager = controller.getDataManager()

  controller.on('progress', (points: number) => {
    console.debug(`[DiodeScout] Receiving data (${points} points)`)
  })
  controller.on('series-completed', (event: SeriesCompletedEvent) => {
    const ranges = computeAxisRanges(manager)
    console.info(
      `[DiodeScout] Series ${event.index + 1}: ${event.pointCount} points ` +
        `(axes 0-${ranges.voltageMax} V, 0-${ranges.currentMax} mA)`
    )
  })
  controller.on('error', (error: Error) => {
    console.error('[DiodeScout] Acquisition error:', error.message)
  })

  await controller.connect(settings.serialPort, settings.baudRate)
  console.info('[DiodeScout] Press the button on the DiodeScout ... (Ctrl+C to stop and export)')

  await waitForStop(controller)
  await controller.disconnect()

  return exportAll(manager, settings)
}

// ============================================================================
// Entry
// ============================================================================

/**
 *
 * @param argv
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let parsed: ParsedCommand
  try {
    parsed = parseCommandLine(argv)
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error))
    console.error(USAGE)
    return 1
  }

  if (parsed.command === 'help') {
    console.log(USAGE)
    return 0
  }

  const store = getConfigStore()
  let settings: AcquisitionSettings
  try {
    settings = resolveAcquisitionSettings(store, parsed.overrides)
  } catch (error) {
    console.error(`${error instanceof Error ? error.message : String(error)} (config file: ${store.path})`)
    return 1
  }

  // Set up the logger first so every later message reaches the log file
  setupLogService({ level: settings.logLevel, logDirectory: path.join(path.dirname(store.path), 'logs') })

  try {
    const results =
      parsed.command === 'replay' ? await replayCapture(parsed.captureFile, settings) : await record(settings)
    return results.every((result) => result.success) ? 0 : 1
  } catch (error) {
    console.error('[DiodeScout] Failed:', error instanceof Error ? error.message : error)
    return 1
  }
}
