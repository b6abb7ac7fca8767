// * Measurement Export
// * Serializes completed measurement series to two plain text formats:
// * - CSV: one block per series, numbers in the locale's conventions (for spreadsheets)
// * - Python: a runnable matplotlib script, numbers always with "." (for the interpreter)
// * Files are written whole through a .tmp file and renamed, so a failed export never
// * leaves a truncated target behind.
// * CSV SCHEMA:
// * Series 1
// * Voltage (V);Current (mA)
// * 0.500000;0.010000

import * as fs from 'fs/promises'

import type { MeasurementSeries } from './measurement-series'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export interface CsvExportOptions {
  /**
   * BCP 47 locale tag for number formatting. Defaults to the process locale.
   */
  locale?: string
}

/**
 * Outcome of one export attempt.
 */
export interface ExportResult {
  /**
   *
   */
  success: boolean
  /**
   *
   */
  filePath: string
  /**
   *
   */
  seriesCount: number
  /**
   *
   */
  bytesWritten?: number
  /**
   * I/O error message when success is false
   */
  error?: string
}

// ============================================================================
// Constants
// ============================================================================

const FRACTION_DIGITS = 6
const CSV_DELIMITER = ';'
const CSV_COLUMN_HEADER = `Voltage (V)${CSV_DELIMITER}Current (mA)`

const SCRIPT_HEADER = ['#!/usr/bin/env python3', 'import matplotlib.pyplot as plt', '', 'series = []', '']

const SCRIPT_PLOT_SECTION = [
  'for i, (v, c) in enumerate(series):',
  "    plt.plot(v, c, label=f'Series {i+1}')",
  '',
  "plt.xlabel('Volt (V)')",
  "plt.ylabel('Milliampere (mA)')",
  'plt.legend()',
  'plt.grid(True)',
  'plt.show()',
]

const localeFormatters = new Map<string, Intl.NumberFormat>()

// ============================================================================
// Number Formatting
// ============================================================================

/**
 * Six fraction digits using the decimal and group separators of a locale.
 * @param value
 * @param locale - Defaults to the process locale
 */
export function formatLocaleFixed(value: number, locale?: string): string {
  const key = locale ?? ''
  let formatter = localeFormatters.get(key)
  if (!formatter) {
    formatter = new Intl.NumberFormat(locale, {
      minimumFractionDigits: FRACTION_DIGITS,
      maximumFractionDigits: FRACTION_DIGITS,
      useGrouping: true,
    })
    localeFormatters.set(key, formatter)
  }
  return formatter.format(value)
}

/**
 * Six fraction digits, "." as decimal point, no grouping, whatever the locale.
 * @param value
 */
export function formatFixed(value: number): string {
  return value.toFixed(FRACTION_DIGITS)
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render the CSV export text.
 * @param series
 * @param options
 */
export function renderCsv(series: readonly MeasurementSeries[], options: CsvExportOptions = {}): string {
  const lines: string[] = []

  series.forEach((entry, i) => {
    lines.push(`Series ${i + 1}`)
    lines.push(CSV_COLUMN_HEADER)
    for (const point of entry.points()) {
      const voltage = formatLocaleFixed(point.voltageVolt, options.locale)
      const current = formatLocaleFixed(point.currentMilliAmp, options.locale)
      lines.push(`${voltage}${CSV_DELIMITER}${current}`)
    }
    lines.push('')
  })

  return lines.map((line) => `${line}\n`).join('')
}

/**
 * Render the Python plotting script.
 * @param series
 */
export function renderPythonScript(series: readonly MeasurementSeries[]): string {
  const lines: string[] = [...SCRIPT_HEADER]

  series.forEach((entry, i) => {
    const idx = i + 1
    const voltages = entry.points().map((point) => formatFixed(point.voltageVolt))
    const currents = entry.points().map((point) => formatFixed(point.currentMilliAmp))

    lines.push(`# Series ${idx}`)
    lines.push(`voltage_${idx} = [${voltages.join(', ')}]`)
    lines.push(`current_${idx} = [${currents.join(', ')}]`)
    lines.push(`series.append((voltage_${idx}, current_${idx}))`)
    lines.push('')
  })

  lines.push(...SCRIPT_PLOT_SECTION)
  return lines.map((line) => `${line}\n`).join('')
}

// ============================================================================
// File Export
// ============================================================================

/**
 * Export completed series to a CSV file (overwrites).
 * @param series
 * @param filePath
 * @param options
 */
export function exportCsv(
  series: readonly MeasurementSeries[],
  filePath: string,
  options: CsvExportOptions = {}
): Promise<ExportResult> {
  return writeExport('CSV', filePath, series.length, () => renderCsv(series, options))
}

/**
 * Export completed series to a Python script (overwrites).
 * @param series
 * @param filePath
 */
export function exportPythonScript(series: readonly MeasurementSeries[], filePath: string): Promise<ExportResult> {
  return writeExport('Python', filePath, series.length, () => renderPythonScript(series))
}

/**
 * Atomic file write using .tmp + rename pattern
 * @param format
 * @param filePath
 * @param seriesCount
 * @param render - Called before the first await, so the text is a snapshot of the series
 */
async function writeExport(
  format: string,
  filePath: string,
  seriesCount: number,
  render: () => string
): Promise<ExportResult> {
  const tmpPath = filePath + '.tmp'
  let content = ''

  try {
    content = render()
    await fs.writeFile(tmpPath, content, 'utf-8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`[MeasurementExport] ${format} export to ${filePath} failed: ${message}`)
    await removeStaleTmp(tmpPath)
    return { success: false, filePath, seriesCount, error: message }
  }

  const bytesWritten = Buffer.byteLength(content, 'utf-8')
  console.log(`[MeasurementExport] ${format} export: ${seriesCount} series, ${bytesWritten} bytes -> ${filePath}`)
  return { success: true, filePath, seriesCount, bytesWritten }
}

/**
 *
 * @param tmpPath
 */
async function removeStaleTmp(tmpPath: string): Promise<void> {
  try {
    await fs.rm(tmpPath, { force: true })
  } catch (error) {
    console.warn(`[MeasurementExport] Could not remove ${tmpPath}:`, error)
  }
}
