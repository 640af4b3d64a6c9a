export type BoundViolation = 'negative' | 'width' | 'height'

export type CoordinateCheck =
  | { valid: true }
  | { valid: false; reason: BoundViolation; message: string }

/**
 * Reports at most one violated bound. Negative origins win over extent checks,
 * and width is checked before height.
 */
export function validateCoordinates(
  x: number,
  y: number,
  width: number,
  height: number,
  deviceWidth: number,
  deviceHeight: number,
): CoordinateCheck {
  if (x < 0 || y < 0) {
    return {
      valid: false,
      reason: 'negative',
      message: `Coordinates cannot be negative: x=${x}, y=${y}`,
    }
  }

  if (x + width > deviceWidth) {
    return {
      valid: false,
      reason: 'width',
      message: `Object extends beyond screen width: ${x + width} > ${deviceWidth}`,
    }
  }

  if (y + height > deviceHeight) {
    return {
      valid: false,
      reason: 'height',
      message: `Object extends beyond screen height: ${y + height} > ${deviceHeight}`,
    }
  }

  return { valid: true }
}
