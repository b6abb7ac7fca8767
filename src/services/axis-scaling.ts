import type { MeasurementDataManager } from './measurement-data-manager'

/** Tick spacing shared by both axes */
export const AXIS_TICK_INTERVAL = 0.5

/**
 * Upper axis bounds for plotting all series from zero.
 */
export interface AxisRanges {
  voltageMax: number
  currentMax: number
}

/**
 * Round up to the next multiple of 0.5.
 * @param value
 */
export function roundUpToHalf(value: number): number {
  return Math.ceil(value / AXIS_TICK_INTERVAL) * AXIS_TICK_INTERVAL
}

/**
 *
 * @param manager
 */
export function computeAxisRanges(manager: MeasurementDataManager): AxisRanges {
  return {
    voltageMax: roundUpToHalf(manager.getMaxVoltage()),
    currentMax: roundUpToHalf(manager.getMaxCurrent()),
  }
}
