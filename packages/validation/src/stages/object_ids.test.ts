import { describe, it, expect } from 'vitest'
import type { Layout } from '@plate-designer/layout'
import { checkObjectIds } from './object_ids.js'

describe('checkObjectIds', () => {
  it('accepts unique ids', () => {
    const layout: Layout = [
      { kind: 'page', id: 0, page: 1 },
      { kind: 'button', id: 1, page: 1, x: 0, y: 0, w: 10, h: 10 },
      { kind: 'label', id: 2, page: 1, x: 0, y: 0, w: 10, h: 10 },
    ]
    expect(checkObjectIds(layout)).toEqual([])
  })

  it('reports each repeated occurrence after the first', () => {
    const layout: Layout = [
      { kind: 'button', id: 4, page: 1, x: 0, y: 0, w: 10, h: 10 },
      { kind: 'button', id: 4, page: 1, x: 20, y: 0, w: 10, h: 10 },
      { kind: 'label', id: 4, page: 2, x: 0, y: 0, w: 10, h: 10 },
    ]

    expect(checkObjectIds(layout)).toEqual([
      { kind: 'object_id', message: 'Duplicate object ID: 4', objectId: 4, page: 1 },
      { kind: 'object_id', message: 'Duplicate object ID: 4', objectId: 4, page: 2 },
    ])
  })

  it('skips objects without an id', () => {
    const layout: Layout = [
      { kind: 'page', page: 1 },
      { kind: 'page', page: 2 },
    ]
    expect(checkObjectIds(layout)).toEqual([])
  })
})
