// * Measurement series container.
// * A series is one acquisition run of the instrument: voltage/current pairs in arrival order.

/**
 * Single sample reported by the instrument.
 */
export interface MeasurementPoint {
  /**
   * X value, Volt
   */
  readonly voltageVolt: number
  /**
   * Y value, Milliampere
   */
  readonly currentMilliAmp: number
}

/**
 * Append-only, ordered list of measurement points.
 */
export class MeasurementSeries {
  private readonly pointList: MeasurementPoint[] = []

  /**
   *
   * @param voltage
   * @param currentMilliAmp
   */
  addPoint(voltage: number, currentMilliAmp: number): void {
    this.pointList.push(Object.freeze({ voltageVolt: voltage, currentMilliAmp }))
  }

  /**
   * Read-only view, not a copy.
   */
  points(): readonly MeasurementPoint[] {
    return this.pointList
  }

  /**
   *
   */
  size(): number {
    return this.pointList.length
  }

  /**
   *
   */
  empty(): boolean {
    return this.pointList.length === 0
  }
}
