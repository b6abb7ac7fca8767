// * Serial Acquisition Controller (TypeScript)
// * Topside control layer for the DiodeScout instrument: serial connection lifecycle and data acquisition.
// * ARCHITECTURE:
// * - Opens/closes the serial port and tracks connection state
// * - Pushes every received byte into the MeasurementDataManager in arrival order
// * - Emits events for completed series and receive progress
// * - The instrument drives acquisition (button on the device); nothing is written to it

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import { SerialLink } from './link/serial'
import { MeasurementDataManager } from './measurement-data-manager'
import { DEFAULT_BAUD_RATE, LINE_FEED, ParseResult } from './measurement-protocol'
import type { MeasurementSeries } from './measurement-series'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  LISTENING = 'listening',
}

/**
 * Payload of the 'series-completed' event.
 */
export interface SeriesCompletedEvent {
  /**
   * Index in the completed collection at emission time
   */
  index: number
  /**
   *
   */
  pointCount: number
  /**
   *
   */
  series: MeasurementSeries
}

/**
 *
 */
export interface HealthData {
  /**
   *
   */
  session_id: string | null
  /**
   *
   */
  state: ConnectionState
  /**
   *
   */
  port: string | null
  /**
   *
   */
  series_count: number
  /**
   * Points received so far for the series in progress
   */
  receiving_points: number
  /**
   *
   */
  last_data_age_ms?: number
}

/**
 * Minimal transport surface used by the controller (SerialLink in production).
 */
export interface AcquisitionLink extends EventEmitter {
  /**
   *
   */
  readonly isOpen: boolean
  /**
   *
   */
  open(): Promise<void>
  /**
   *
   */
  close(): Promise<void>
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class SerialIOError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'SerialIOError'
  }
}

// ============================================================================
// SerialAcquisitionController Class
// ============================================================================

// * EVENT EMISSION: 'series-completed', 'progress', 'error', 'state-change'.
// ! THREAD SAFETY: Not thread-safe; all calls and serial callbacks run on the event loop.
/**
 *
 */
export class SerialAcquisitionController extends EventEmitter {
  private link: AcquisitionLink | null = null
  private state: ConnectionState = ConnectionState.DISCONNECTED
  private readonly dataManager: MeasurementDataManager
  private sessionId: string | null = null

  // Connection parameters for reconnection
  private lastPort: string | null = null
  private lastBaud = DEFAULT_BAUD_RATE

  private lastDataTimestamp: number | null = null

  // Close of a link dropped after an error, awaited by disconnect()
  private pendingClose: Promise<void> | null = null

  /**
   *
   * @param dataManager
   */
  constructor(dataManager: MeasurementDataManager = new MeasurementDataManager()) {
    super()
    this.dataManager = dataManager
  }

  // ========================================================================
  // Factory Methods (for test injection)
  // ========================================================================

  // * Create a serial link instance (protected for test mocking).
  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): AcquisitionLink {
    const uri = new URL(`serial:${port}?baudrate=${baudRate}`)
    return new SerialLink(uri)
  }

  // ========================================================================
  // Connection Management
  // ========================================================================

  // * Open the port and start listening for measurement series.
  /**
   *
   * @param port
   * @param baudRate
   */
  async connect(port: string, baudRate = DEFAULT_BAUD_RATE): Promise<void> {
    console.log(`[SerialAcquisition] connect() called - port: ${port}, baudRate: ${baudRate}, currentState: ${this.state}`)

    if (this.state !== ConnectionState.DISCONNECTED) {
      const errorMsg = `Already connected (state: ${this.state})`
      console.error(`[SerialAcquisition] connect() rejected: ${errorMsg}`)
      throw new SerialIOError(errorMsg)
    }

    this.lastPort = port
    this.lastBaud = baudRate

    const link = this.createSerialLink(port, baudRate)
    link.on('data', (data: Buffer) => this.handleSerialData(data))
    link.on('error', (error: Error) => this.handleSerialError(error))
    link.on('close', () => this.handleSerialClose())

    try {
      await link.open()
    } catch (error) {
      link.removeAllListeners()
      console.error('[SerialAcquisition] link.open() failed:', error)
      const reason = error instanceof Error ? error.message : String(error)
      throw new SerialIOError(`Failed to open port ${port}: ${reason}`)
    }

    this.link = link
    this.sessionId = uuidv4()
    this.lastDataTimestamp = null
    this.state = ConnectionState.LISTENING
    this.emitStateChange()
    console.log(`[SerialAcquisition] Listening on ${port} (session ${this.sessionId})`)
  }

  // * Close the port. Completed series stay in the data manager.
  /**
   *
   */
  async disconnect(): Promise<void> {
    if (this.pendingClose) {
      await this.pendingClose
    }
    if (this.state === ConnectionState.DISCONNECTED) {
      return
    }

    console.log('[SerialAcquisition] Disconnecting...')

    const link = this.link
    this.link = null
    if (link) {
      link.removeAllListeners()
      try {
        await link.close()
      } catch (error) {
        console.error('[SerialAcquisition] Error closing port:', error)
      }
    }

    this.state = ConnectionState.DISCONNECTED
    this.emitStateChange()
    console.log('[SerialAcquisition] Disconnected')
  }

  // * Reconnect using last known port/baud.
  /**
   *
   */
  async reconnect(): Promise<void> {
    if (!this.lastPort) {
      throw new SerialIOError('Cannot reconnect: no previous connection')
    }

    console.log(`[SerialAcquisition] Reconnecting to ${this.lastPort}...`)

    await this.disconnect()
    await this.connect(this.lastPort, this.lastBaud)
  }

  // ========================================================================
  // Health / Status
  // ========================================================================

  /**
   *
   */
  getHealth(): HealthData {
    const lastDataAge = this.lastDataTimestamp !== null ? Date.now() - this.lastDataTimestamp : undefined

    return {
      session_id: this.sessionId,
      state: this.state,
      port: this.lastPort,
      series_count: this.dataManager.seriesCount(),
      receiving_points: this.dataManager.tempSeriesSize(),
      last_data_age_ms: lastDataAge,
    }
  }

  /**
   *
   */
  isConnected(): boolean {
    return this.link !== null && this.link.isOpen && this.state !== ConnectionState.DISCONNECTED
  }

  /**
   *
   */
  getState(): ConnectionState {
    return this.state
  }

  /**
   *
   */
  getSessionId(): string | null {
    return this.sessionId
  }

  /**
   * Store holding completed series (queries, removal, export).
   */
  getDataManager(): MeasurementDataManager {
    return this.dataManager
  }

  // ========================================================================
  // Internal Helpers: Serial I/O
  // ========================================================================

  /**
   *
   * @param data
   */
  private handleSerialData(data: Buffer): void {
    this.lastDataTimestamp = Date.now()

    for (const byte of data) {
      const result = this.dataManager.processReceivedChar(byte)
      if (result === ParseResult.SERIES_COMPLETED) {
        this.emitSeriesCompleted()
      } else if (byte === LINE_FEED && this.dataManager.isReceiving()) {
        this.emit('progress', this.dataManager.tempSeriesSize())
      }
    }
  }

  /**
   *
   */
  private emitSeriesCompleted(): void {
    const index = this.dataManager.seriesCount() - 1
    const series = this.dataManager.series(index)
    console.log(`[SerialAcquisition] Series ${index + 1} completed (${series.size()} points)`)

    const event: SeriesCompletedEvent = { index, pointCount: series.size(), series }
    this.emit('series-completed', event)
  }

  /**
   *
   * @param error
   */
  private handleSerialError(error: Error): void {
    console.error('[SerialAcquisition] Serial error:', error)
    this.emit('error', error)
    this.cleanupAfterUnexpectedDisconnect()
  }

  /**
   *
   */
  private handleSerialClose(): void {
    console.warn('[SerialAcquisition] Serial port closed unexpectedly')
    this.cleanupAfterUnexpectedDisconnect(new SerialIOError('Serial port closed unexpectedly'))
  }

  /**
   *
   * @param error
   */
  private cleanupAfterUnexpectedDisconnect(error?: Error): void {
    const link = this.link
    this.link = null
    if (link) {
      link.removeAllListeners()
      this.pendingClose = this.closeDroppedLink(link)
    }
    if (this.state !== ConnectionState.DISCONNECTED) {
      this.state = ConnectionState.DISCONNECTED
      this.emitStateChange()
    }
    if (error) {
      this.emit('error', error)
    }
  }

  /**
   * Release the port of a link that failed. Later link errors are only logged.
   * @param link
   */
  private async closeDroppedLink(link: AcquisitionLink): Promise<void> {
    const logLateError = (error: Error): void => {
      console.warn('[SerialAcquisition] Error on dropped link:', error)
    }
    link.on('error', logLateError)

    try {
      await link.close()
    } catch (error) {
      console.error('[SerialAcquisition] Error closing port after failure:', error)
    } finally {
      link.off('error', logLateError)
      this.pendingClose = null
    }
  }

  /**
   *
   */
  private emitStateChange(): void {
    this.emit('state-change', this.state)
  }
}
