import type { Layout } from '@plate-designer/layout'
import type { ValidationErrorType } from '../types.js'

/**
 * Reports every repeated occurrence after the first, so three objects sharing
 * an id produce two errors.
 */
export function checkObjectIds(layout: Layout): ValidationErrorType[] {
  const errors: ValidationErrorType[] = []
  const seen = new Set<number>()

  for (const obj of layout) {
    if (obj.id === undefined) continue

    if (seen.has(obj.id)) {
      errors.push({
        kind: 'object_id',
        message: `Duplicate object ID: ${obj.id}`,
        objectId: obj.id,
        page: obj.page,
      })
    } else {
      seen.add(obj.id)
    }
  }

  return errors
}
