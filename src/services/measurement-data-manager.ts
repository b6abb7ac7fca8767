// * Measurement Data Manager
// * Central store for the acquisition:
// * - Assembles serial bytes into lines and drives the series state machine
// * - Holds the series in progress while the instrument is sending
// * - Keeps every completed series in completion order
// * - Answers aggregate queries for the UI (point counts, axis maxima) and exports
// ! Not re-entrant. Feed bytes and query from a single owner (the Node event loop).

import { type CsvExportOptions, type ExportResult, exportCsv, exportPythonScript } from './measurement-export'
import { CARRIAGE_RETURN, classifyLine, LINE_FEED, ParseResult } from './measurement-protocol'
import { type MeasurementPoint, MeasurementSeries } from './measurement-series'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Parser state. The series in progress only exists while receiving.
 */
type ParserState = { kind: 'idle' } | { kind: 'receiving'; series: MeasurementSeries }

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class SeriesIndexOutOfRangeError extends RangeError {
  /**
   *
   * @param index
   * @param count
   */
  constructor(index: number, count: number) {
    super(`Series index ${index} out of range (series count: ${count})`)
    this.name = 'SeriesIndexOutOfRangeError'
  }
}

// ============================================================================
// MeasurementDataManager Class
// ============================================================================

/**
 *
 */
export class MeasurementDataManager {
  private state: ParserState = { kind: 'idle' }
  private currentLine = ''
  private readonly completed: MeasurementSeries[] = []

  // ========================================================================
  // Store Queries & Mutation
  // ========================================================================

  /**
   *
   */
  seriesCount(): number {
    return this.completed.length
  }

  /**
   * Completed series in completion order (read-only view).
   */
  allSeries(): readonly MeasurementSeries[] {
    return this.completed
  }

  /**
   * Completed series by index. Indices shift after a removal.
   * @param index
   * @throws SeriesIndexOutOfRangeError
   */
  series(index: number): MeasurementSeries {
    if (!Number.isInteger(index) || index < 0 || index >= this.completed.length) {
      throw new SeriesIndexOutOfRangeError(index, this.completed.length)
    }
    return this.completed[index]
  }

  /**
   * Removes all completed series. The series in progress is kept.
   */
  removeAllSeries(): void {
    this.completed.length = 0
  }

  /**
   *
   */
  removeLastSeries(): void {
    this.completed.pop()
  }

  /**
   * Point count of the series in progress, 0 while idle.
   */
  tempSeriesSize(): number {
    return this.state.kind === 'receiving' ? this.state.series.size() : 0
  }

  /**
   *
   */
  isReceiving(): boolean {
    return this.state.kind === 'receiving'
  }

  /**
   * Highest voltage over completed series and the series in progress, 0 when there are no points.
   */
  getMaxVoltage(): number {
    return this.maxOver((point) => point.voltageVolt)
  }

  /**
   * Highest current over completed series and the series in progress, 0 when there are no points.
   */
  getMaxCurrent(): number {
    return this.maxOver((point) => point.currentMilliAmp)
  }

  // ========================================================================
  // Parser
  // ========================================================================

  /**
   * Process a single received byte.
   * @param byte - 0-255
   * @returns SERIES_COMPLETED when this byte closed a non-empty series
   */
  processReceivedChar(byte: number): ParseResult {
    if (byte === LINE_FEED) {
      const line = this.currentLine
      this.currentLine = ''
      return this.handleCompletedLine(line)
    }

    if (byte !== CARRIAGE_RETURN) {
      this.currentLine += String.fromCharCode(byte & 0xff)
    }

    return ParseResult.NOTHING
  }

  /**
   * Feed a chunk byte by byte.
   * @param data
   * @returns Number of series completed by this chunk
   */
  processReceivedData(data: Uint8Array): number {
    let completedCount = 0
    for (const byte of data) {
      if (this.processReceivedChar(byte) === ParseResult.SERIES_COMPLETED) {
        completedCount++
      }
    }
    return completedCount
  }

  // ========================================================================
  // Export
  // ========================================================================

  /**
   * Export all completed series as CSV.
   * @param filePath
   * @param options
   */
  exportCSV(filePath: string, options: CsvExportOptions = {}): Promise<ExportResult> {
    return exportCsv(this.completed, filePath, options)
  }

  /**
   * Export all completed series as a Python plotting script.
   * @param filePath
   */
  exportPython(filePath: string): Promise<ExportResult> {
    return exportPythonScript(this.completed, filePath)
  }

  // ========================================================================
  // Internal Helpers
  // ========================================================================

  /**
   *
   * @param rawLine
   */
  private handleCompletedLine(rawLine: string): ParseResult {
    const line = classifyLine(rawLine)

    switch (line.kind) {
      case 'open':
        // A second "*" before "#" drops the unfinished series
        this.state = { kind: 'receiving', series: new MeasurementSeries() }
        return ParseResult.NOTHING

      case 'close':
        if (this.state.kind === 'receiving' && !this.state.series.empty()) {
          this.completed.push(this.state.series)
          this.state = { kind: 'idle' }
          return ParseResult.SERIES_COMPLETED
        }
        return ParseResult.NOTHING

      case 'data':
        if (this.state.kind === 'receiving') {
          this.state.series.addPoint(line.voltage, line.current)
        }
        return ParseResult.NOTHING

      case 'empty':
      case 'metadata':
      case 'invalid':
        return ParseResult.NOTHING
    }
  }

  /**
   *
   * @param axis
   */
  private maxOver(axis: (point: MeasurementPoint) => number): number {
    let max = 0.0

    const scan = (series: MeasurementSeries): void => {
      for (const point of series.points()) {
        const value = axis(point)
        if (value > max) {
          max = value
        }
      }
    }

    this.completed.forEach(scan)
    if (this.state.kind === 'receiving') {
      scan(this.state.series)
    }

    return max
  }
}
