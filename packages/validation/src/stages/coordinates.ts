import { validateCoordinates } from '@plate-designer/geometry'
import type { ResolutionType } from '@plate-designer/devices'
import type { Widget } from '@plate-designer/layout'
import type { ValidationErrorType } from '../types.js'
import { describeId } from './describe.js'

/** One `coordinate` error per widget that does not fit on the screen. */
export function checkCoordinates(
  widgets: readonly Widget[],
  resolution: ResolutionType,
): ValidationErrorType[] {
  const errors: ValidationErrorType[] = []

  for (const widget of widgets) {
    const check = validateCoordinates(
      widget.x,
      widget.y,
      widget.w,
      widget.h,
      resolution.width,
      resolution.height,
    )
    if (check.valid) continue

    errors.push({
      kind: 'coordinate',
      message: `Object ${describeId(widget.id)}: ${check.message}`,
      objectId: widget.id,
      page: widget.page,
    })
  }

  return errors
}
