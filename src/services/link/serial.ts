import EventEmitter from 'events'
import type { SerialPort } from 'serialport'

import { DEFAULT_BAUD_RATE } from '../measurement-protocol'

/**
 *
 */
export interface SerialLinkOptions {
  /**
   * Device path, e.g. /dev/ttyUSB0 or COM3
   */
  path: string
  /**
   *
   */
  baudRate: number
}

/**
 *
 */
export class SerialUriError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'SerialUriError'
  }
}

/**
 * Parse a link URI of the form "serial:<path>?baudrate=<n>".
 * @param uri
 */
export function parseSerialUri(uri: URL): SerialLinkOptions {
  if (uri.protocol !== 'serial:') {
    throw new SerialUriError(`Unsupported link protocol: ${uri.protocol}`)
  }

  const path = decodeURIComponent(uri.pathname)
  if (!path) {
    throw new SerialUriError(`Serial link URI has no port path: ${uri.href}`)
  }

  const baudParam = uri.searchParams.get('baudrate')
  const baudRate = baudParam === null ? DEFAULT_BAUD_RATE : Number(baudParam)
  if (!Number.isInteger(baudRate) || baudRate <= 0) {
    throw new SerialUriError(`Invalid baud rate: ${baudParam}`)
  }

  return { path, baudRate }
}

// * Serial transport for the instrument: 8 data bits, no parity, 1 stop bit, no flow control.
// * EVENTS: 'data' (Buffer), 'error' (Error), 'close'.
/**
 *
 */
export class SerialLink extends EventEmitter {
  readonly options: SerialLinkOptions
  private port: SerialPort | null = null

  /**
   *
   * @param uri
   */
  constructor(uri: URL) {
    super()
    this.options = parseSerialUri(uri)
  }

  /**
   *
   */
  get isOpen(): boolean {
    return this.port !== null && this.port.isOpen
  }

  /**
   *
   */
  async open(): Promise<void> {
    // Native module, loaded on first use only
    const serialport = await import('serialport')
    const port = new serialport.SerialPort({
      path: this.options.path,
      baudRate: this.options.baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      rtscts: false,
      autoOpen: false,
    })

    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()))
    })

    port.on('data', (chunk: Buffer) => this.emit('data', chunk))
    port.on('error', (error: Error) => this.emit('error', error))
    port.on('close', () => {
      this.port = null
      this.emit('close')
    })
    this.port = port
  }

  /**
   *
   */
  async close(): Promise<void> {
    const port = this.port
    if (!port) {
      return
    }

    // Detach first so a requested close is not reported as a lost device
    port.removeAllListeners('close')
    this.port = null

    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()))
    })
  }
}
