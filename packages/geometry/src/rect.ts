import { z } from 'zod'

export const Rect = z.object({
  x: z.number().int(),
  y: z.number().int(),
  w: z.number().int(),
  h: z.number().int(),
})
export type RectType = z.infer<typeof Rect>

/**
 * Half-open overlap test: rectangles that only share an edge do not overlap.
 */
export function overlaps(a: RectType, b: RectType): boolean {
  return !(a.x + a.w <= b.x || b.x + b.w <= a.x || a.y + a.h <= b.y || b.y + b.h <= a.y)
}

/** Inclusive at the far edges, so an exact fit is contained. */
export function contains(inner: RectType, outerWidth: number, outerHeight: number): boolean {
  return (
    inner.x >= 0 &&
    inner.y >= 0 &&
    inner.x + inner.w <= outerWidth &&
    inner.y + inner.h <= outerHeight
  )
}
