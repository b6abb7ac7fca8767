/**
 * Unit tests for the Serial Acquisition Controller
 *
 * These tests verify the connection state machine and the byte feeding /
 * event emission using a mocked serial link.
 */

import EventEmitter from 'events'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  type AcquisitionLink,
  ConnectionState,
  type SeriesCompletedEvent,
  SerialAcquisitionController,
  SerialIOError,
} from '../src/services/serial-acquisition-controller'

// ============================================================================
// Mock Serial Link
// ============================================================================

/**
 *
 */
class MockSerialLink extends EventEmitter {
  isOpen = false
  openError: Error | null = null
  closeCalls = 0

  /**
   *
   */
  async open(): Promise<void> {
    if (this.openError) {
      throw this.openError
    }
    this.isOpen = true
  }

  /**
   *
   */
  async close(): Promise<void> {
    this.closeCalls++
    this.isOpen = false
    this.removeAllListeners()
  }

  // Test helper: simulate incoming data
  /**
   *
   * @param data
   */
  simulateData(data: string): void {
    this.emit('data', Buffer.from(data, 'latin1'))
  }

  // Test helper: simulate unplugged device
  /**
   *
   */
  simulateClose(): void {
    this.isOpen = false
    this.emit('close')
  }
}

/**
 * Controller whose link factory returns the mock.
 */
class TestAcquisitionController extends SerialAcquisitionController {
  readonly linkRequests: Array<{ port: string; baudRate: number }> = []

  /**
   *
   * @param mockLink
   */
  constructor(private readonly mockLink: MockSerialLink) {
    super()
  }

  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): AcquisitionLink {
    this.linkRequests.push({ port, baudRate })
    return this.mockLink
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('SerialAcquisitionController', () => {
  let mockLink: MockSerialLink
  let controller: TestAcquisitionController
  let errors: Error[]

  beforeEach(() => {
    mockLink = new MockSerialLink()
    controller = new TestAcquisitionController(mockLink)
    errors = []
    controller.on('error', (error: Error) => errors.push(error))
  })

  afterEach(async () => {
    await controller.disconnect()
  })

  describe('Connection Management', () => {
    it('should start in DISCONNECTED state', () => {
      expect(controller.getState()).toBe(ConnectionState.DISCONNECTED)
      expect(controller.isConnected()).toBe(false)
      expect(controller.getSessionId()).toBeNull()
    })

    it('should connect and start listening', async () => {
      const states: ConnectionState[] = []
      controller.on('state-change', (state: ConnectionState) => states.push(state))

      await controller.connect('/dev/ttyUSB0')

      expect(controller.getState()).toBe(ConnectionState.LISTENING)
      expect(controller.isConnected()).toBe(true)
      expect(states).toEqual([ConnectionState.LISTENING])
      expect(controller.linkRequests).toEqual([{ port: '/dev/ttyUSB0', baudRate: 9600 }])
      expect(controller.getSessionId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    })

    it('should prevent connection when already connected', async () => {
      await controller.connect('/dev/ttyUSB0')
      await expect(controller.connect('/dev/ttyUSB1')).rejects.toThrow(SerialIOError)
      expect(controller.linkRequests).toHaveLength(1)
    })

    it('should wrap open failures in SerialIOError', async () => {
      mockLink.openError = new Error('Resource busy')

      await expect(controller.connect('/dev/ttyUSB0', 115200)).rejects.toThrow(
        'Failed to open port /dev/ttyUSB0: Resource busy'
      )
      expect(controller.getState()).toBe(ConnectionState.DISCONNECTED)
      expect(mockLink.listenerCount('data')).toBe(0)
    })

    it('should disconnect and keep completed series', async () => {
      await controller.connect('/dev/ttyUSB0')
      mockLink.simulateData('*\n1 2\n#\n')

      await controller.disconnect()

      expect(controller.getState()).toBe(ConnectionState.DISCONNECTED)
      expect(mockLink.isOpen).toBe(false)
      expect(controller.getDataManager().seriesCount()).toBe(1)
    })

    it('should treat disconnect while disconnected as a no-op', async () => {
      const listener = vi.fn()
      controller.on('state-change', listener)
      await controller.disconnect()
      expect(listener).not.toHaveBeenCalled()
    })

    it('should refuse to reconnect without a previous connection', async () => {
      await expect(controller.reconnect()).rejects.toThrow('Cannot reconnect: no previous connection')
    })

    it('should reconnect with the last port and baud rate', async () => {
      await controller.connect('/dev/ttyACM0', 19200)
      const firstSession = controller.getSessionId()

      await controller.reconnect()

      expect(controller.getState()).toBe(ConnectionState.LISTENING)
      expect(controller.linkRequests).toEqual([
        { port: '/dev/ttyACM0', baudRate: 19200 },
        { port: '/dev/ttyACM0', baudRate: 19200 },
      ])
      expect(controller.getSessionId()).not.toBe(firstSession)
    })
  })

  describe('Acquisition', () => {
    beforeEach(async () => {
      await controller.connect('/dev/ttyUSB0')
    })

    it('should emit series-completed once per closed series', async () => {
      const completed: SeriesCompletedEvent[] = []
      controller.on('series-completed', (event: SeriesCompletedEvent) => completed.push(event))

      mockLink.simulateData('*\r\n1.0 0.5\r\n2.0 1.0\r\n#\r\n')

      expect(completed).toHaveLength(1)
      expect(completed[0].index).toBe(0)
      expect(completed[0].pointCount).toBe(2)
      expect(completed[0].series).toBe(controller.getDataManager().series(0))
    })

    it('should emit progress for every line received inside a series', () => {
      const progress: number[] = []
      controller.on('progress', (points: number) => progress.push(points))

      mockLink.simulateData('* AVCC = 5.0\n*\n1.0 0.5\n2.0 1.0\n#\n3.0 3.0\n')

      expect(progress).toEqual([0, 1, 2])
    })

    it('should assemble lines split across chunks', () => {
      const completed = vi.fn()
      controller.on('series-completed', completed)

      mockLink.simulateData('*\r')
      mockLink.simulateData('\n0.')
      mockLink.simulateData('5 0.0')
      mockLink.simulateData('1\r\n#')
      expect(completed).not.toHaveBeenCalled()

      mockLink.simulateData('\r\n')
      expect(completed).toHaveBeenCalledTimes(1)
      expect(controller.getDataManager().series(0).points()).toEqual([{ voltageVolt: 0.5, currentMilliAmp: 0.01 }])
    })

    it('should report health', () => {
      mockLink.simulateData('*\n1 1\n#\n*\n2 2\n')

      const health = controller.getHealth()

      expect(health.session_id).toBe(controller.getSessionId())
      expect(health.state).toBe(ConnectionState.LISTENING)
      expect(health.port).toBe('/dev/ttyUSB0')
      expect(health.series_count).toBe(1)
      expect(health.receiving_points).toBe(1)
      expect(health.last_data_age_ms).toBeGreaterThanOrEqual(0)
    })
  })

  describe('Unexpected disconnects', () => {
    beforeEach(async () => {
      await controller.connect('/dev/ttyUSB0')
    })

    it('should go DISCONNECTED and emit an error when the port closes', () => {
      const states: ConnectionState[] = []
      controller.on('state-change', (state: ConnectionState) => states.push(state))

      mockLink.simulateClose()

      expect(controller.getState()).toBe(ConnectionState.DISCONNECTED)
      expect(states).toEqual([ConnectionState.DISCONNECTED])
      expect(errors).toHaveLength(1)
      expect(errors[0]).toBeInstanceOf(SerialIOError)
      expect(errors[0].message).toBe('Serial port closed unexpectedly')
    })

    it('should forward link errors and clean up', async () => {
      const linkError = new Error('Input/output error')
      mockLink.emit('error', linkError)

      expect(errors).toEqual([linkError])
      expect(controller.getState()).toBe(ConnectionState.DISCONNECTED)
      expect(mockLink.listenerCount('data')).toBe(0)

      await controller.disconnect()
      expect(mockLink.closeCalls).toBe(1)
      expect(mockLink.isOpen).toBe(false)
    })

    it('should let reconnect wait for the failed link to close', async () => {
      mockLink.emit('error', new Error('Input/output error'))

      await controller.reconnect()

      expect(mockLink.closeCalls).toBe(1)
      expect(controller.getState()).toBe(ConnectionState.LISTENING)
      expect(controller.linkRequests).toHaveLength(2)
    })
  })
})
