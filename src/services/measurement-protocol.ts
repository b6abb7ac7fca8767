/**
 * DiodeScout Line Protocol
 *
 * The instrument streams plain text lines (CRLF or LF terminated):
 *
 *   *              <- opens a measurement series
 *   * AVCC = 5.0   <- metadata, never opens or closes anything
 *   0.512 0.031    <- "<voltage> <current>" sample
 *   #              <- closes the series
 *
 * This module holds the protocol constants and turns one complete line into a
 * classified, strongly-typed value. Byte assembly and state live in
 * MeasurementDataManager.
 */

// ============================================================================
// Protocol Constants
// ============================================================================

/** Terminates a line */
export const LINE_FEED = 0x0a

/** Dropped wherever it appears */
export const CARRIAGE_RETURN = 0x0d

/** Opens a new series */
export const OPEN_SENTINEL = '*'

/** Closes the series in progress */
export const CLOSE_SENTINEL = '#'

/** Serial settings used by the instrument (8N1, no flow control) */
export const DEFAULT_BAUD_RATE = 9600

// ============================================================================
// Regular Expressions for Parsing
// ============================================================================

/** ASCII whitespace only; bytes above 0x7f are payload */
const RE_EDGE_WHITESPACE = /^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g

const RE_TOKEN_SEPARATOR = /[ \t\n\v\f\r]+/

/**
 * Full decimal literal: optional sign, digits with optional fraction (or a bare
 * fraction), optional exponent. "nan", "inf" and hex are not numbers here.
 */
export const RE_DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Outcome of feeding one byte.
 */
export enum ParseResult {
  NOTHING = 'nothing',
  SERIES_COMPLETED = 'series_completed',
}

/**
 * A complete line after trimming and classification.
 */
export type ProtocolLine =
  | { kind: 'empty' }
  | { kind: 'open' }
  | { kind: 'close' }
  | { kind: 'metadata'; text: string }
  | { kind: 'data'; voltage: number; current: number }
  | { kind: 'invalid'; text: string }

// ============================================================================
// Custom Errors
// ============================================================================

/**
 *
 */
export class InvalidLineError extends Error {
  /**
   *
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'InvalidLineError'
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Strip leading and trailing ASCII whitespace.
 * @param line
 */
export function trimLine(line: string): string {
  return line.replace(RE_EDGE_WHITESPACE, '')
}

/**
 * Parse a data line in the format "<voltage> <current>".
 *
 * Only the first two tokens are read; anything after them is ignored.
 * @param line - Trimmed line
 * @returns Voltage and current
 * @throws InvalidLineError if the line does not start with two numbers
 */
export function parseDataLine(line: string): [number, number] {
  const tokens = line.split(RE_TOKEN_SEPARATOR).filter((token) => token.length > 0)
  if (tokens.length < 2) {
    throw new InvalidLineError(`Expected two values, got ${tokens.length}: ${line}`)
  }

  const [first, second] = tokens
  if (!RE_DECIMAL_NUMBER.test(first) || !RE_DECIMAL_NUMBER.test(second)) {
    throw new InvalidLineError(`Data line is not numeric: ${line}`)
  }

  const voltage = Number(first)
  const current = Number(second)
  if (!Number.isFinite(voltage) || !Number.isFinite(current)) {
    throw new InvalidLineError(`Data line out of range: ${line}`)
  }

  return [voltage, current]
}

/**
 * Classify one raw line (terminator already removed).
 * @param rawLine
 */
export function classifyLine(rawLine: string): ProtocolLine {
  const line = trimLine(rawLine)
  if (line.length === 0) {
    return { kind: 'empty' }
  }

  if (line === OPEN_SENTINEL) {
    return { kind: 'open' }
  }

  // Lines like "* AVCC = 5.0"
  if (line.startsWith(OPEN_SENTINEL)) {
    return { kind: 'metadata', text: trimLine(line.slice(OPEN_SENTINEL.length)) }
  }

  if (line === CLOSE_SENTINEL) {
    return { kind: 'close' }
  }

  try {
    const [voltage, current] = parseDataLine(line)
    return { kind: 'data', voltage, current }
  } catch (error) {
    if (error instanceof InvalidLineError) {
      return { kind: 'invalid', text: line }
    }
    throw error
  }
}
