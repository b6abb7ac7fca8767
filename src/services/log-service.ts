import log from 'electron-log/node'
import * as path from 'path'

import type { LogLevel } from './config-store'

export const LOG_FILE_NAME = 'acquisition.log'

/**
 *
 */
export interface LogServiceOptions {
  /**
   *
   */
  level: LogLevel
  /**
   * Directory for the log file
   */
  logDirectory: string
}

/**
 *
 * @param directory
 */
export function resolveLogFilePath(directory: string): string {
  return path.join(directory, LOG_FILE_NAME)
}

/**
 * Route console.* through electron-log (file + console transports).
 * Call before any other module logs.
 * @param options
 */
export function setupLogService(options: LogServiceOptions): void {
  const logFilePath = resolveLogFilePath(options.logDirectory)

  log.transports.file.resolvePathFn = () => logFilePath
  log.transports.file.level = options.level
  log.transports.console.level = options.level

  Object.assign(console, log.functions)
  console.log(`[LogService] Logging to ${logFilePath} (level: ${options.level})`)
}
