/**
 * Unit tests for the command-line entry: argument parsing and capture replay.
 */

import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { exportAll, parseCommandLine, replayCapture, UsageError } from '../src/main'
import { MeasurementDataManager } from '../src/services/measurement-data-manager'

describe('parseCommandLine()', () => {
  it('should show help without a command', () => {
    expect(parseCommandLine([])).toEqual({ command: 'help' })
    expect(parseCommandLine(['record', '--help'])).toEqual({ command: 'help' })
  })

  it('should parse record options into overrides', () => {
    expect(
      parseCommandLine(['record', '--port', '/dev/ttyUSB0', '--baud', '19200', '--locale', 'de-DE', '--log-level', 'debug'])
    ).toEqual({
      command: 'record',
      overrides: { serialPort: '/dev/ttyUSB0', baudRate: 19200, csvLocale: 'de-DE', logLevel: 'debug' },
    })
  })

  it('should resolve the output directory', () => {
    const parsed = parseCommandLine(['replay', 'capture.bin', '--out-dir', 'exports'])
    expect(parsed).toEqual({
      command: 'replay',
      captureFile: 'capture.bin',
      overrides: { exportDirectory: path.resolve('exports') },
    })
  })

  it('should reject bad input', () => {
    expect(() => parseCommandLine(['replay'])).toThrow('replay needs a capture file')
    expect(() => parseCommandLine(['record', '--baud', 'fast'])).toThrow(UsageError)
    expect(() => parseCommandLine(['record', '--log-level', 'loud'])).toThrow('Invalid log level: loud')
    expect(() => parseCommandLine(['record', '--locale', 'de_DE'])).toThrow('Invalid locale: de_DE')
    expect(() => parseCommandLine(['plot'])).toThrow('Unknown command: plot')
  })
})

describe('replayCapture()', () => {
  let workDir: string

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'diodescout-replay-'))
  })

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true })
  })

  it('should replay a capture file and export both formats', async () => {
    const captureFile = path.join(workDir, 'capture.bin')
    await fs.writeFile(captureFile, '* AVCC = 5.0\r\n*\r\n0.5 0.01\r\n0.7 1.25\r\n#\r\n*\r\n0.6\r\n')
    const exportDirectory = path.join(workDir, 'out')

    const results = await replayCapture(captureFile, { exportDirectory, csvLocale: 'en-US' })

    expect(results.map((result) => result.success)).toEqual([true, true])
    expect(await fs.readFile(path.join(exportDirectory, 'dscout.csv'), 'utf-8')).toBe(
      'Series 1\nVoltage (V);Current (mA)\n0.500000;0.010000\n0.700000;1.250000\n\n'
    )
    const script = await fs.readFile(path.join(exportDirectory, 'dscout.py'), 'utf-8')
    expect(script).toContain('voltage_1 = [0.500000, 0.700000]\ncurrent_1 = [0.010000, 1.250000]\n')
  })

  it('should reject a missing capture file', async () => {
    await expect(
      replayCapture(path.join(workDir, 'missing.bin'), { exportDirectory: workDir, csvLocale: 'en-US' })
    ).rejects.toThrow('ENOENT')
  })
})

describe('exportAll()', () => {
  it('should reject when the export directory cannot be created', async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'diodescout-exportall-'))
    try {
      // A file where the export directory should be
      const blocker = path.join(workDir, 'blocker')
      await fs.writeFile(blocker, '')

      await expect(
        exportAll(new MeasurementDataManager(), { exportDirectory: blocker, csvLocale: 'en-US' })
      ).rejects.toThrow()
    } finally {
      await fs.rm(workDir, { recursive: true, force: true })
    }
  })
})
