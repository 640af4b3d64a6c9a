import { overlaps } from '@plate-designer/geometry'
import type { Widget } from '@plate-designer/layout'
import type { ValidationWarningType } from '../types.js'
import { describeId } from './describe.js'

function orderPair(a: Widget, b: Widget): [Widget, Widget] {
  if (a.id === undefined) return b.id === undefined ? [a, b] : [b, a]
  if (b.id === undefined) return [a, b]
  return b.id < a.id ? [b, a] : [a, b]
}

/**
 * Pairwise check within each page. Layouts hold tens of objects, so the
 * quadratic scan stays.
 */
export function detectOverlaps(widgets: readonly Widget[]): ValidationWarningType[] {
  const byPage = new Map<number, Widget[]>()
  for (const widget of widgets) {
    const group = byPage.get(widget.page)
    if (group) group.push(widget)
    else byPage.set(widget.page, [widget])
  }

  const warnings: ValidationWarningType[] = []
  for (const [page, group] of byPage) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        const a = group[i]
        const b = group[j]
        if (!a || !b || !overlaps(a, b)) continue

        const [low, high] = orderPair(a, b)
        warnings.push({
          kind: 'overlap',
          message: `Objects ${describeId(low.id)} and ${describeId(high.id)} overlap on page ${page}`,
          objectId: low.id,
        })
      }
    }
  }

  return warnings
}
