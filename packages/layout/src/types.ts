import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import type { RectType } from '@plate-designer/geometry'
extendZodWithOpenApi(z)

export const WIDGET_KINDS = ['button', 'label', 'slider', 'checkbox', 'switch', 'dropdown'] as const
export const LAYOUT_KINDS = ['page', ...WIDGET_KINDS] as const

export type WidgetKind = (typeof WIDGET_KINDS)[number]
export type LayoutKind = (typeof LAYOUT_KINDS)[number]

// Short names used by the openHASP JSONL format.
export const KIND_ALIASES: Readonly<Record<string, LayoutKind>> = {
  btn: 'button',
  cb: 'checkbox',
  sw: 'switch',
  dd: 'dropdown',
}

export const DEFAULT_PAGE = 1

export interface PageMarker {
  kind: 'page'
  id?: number
  page: number
}

export interface Widget extends RectType {
  kind: WidgetKind
  id?: number
  page: number
  entityRef?: string
}

export type LayoutObject = PageMarker | Widget

export type Layout = readonly LayoutObject[]

export function isWidget(obj: LayoutObject): obj is Widget {
  return obj.kind !== 'page'
}

/**
 * A loosely spelled record as it arrives from the designer, an imported JSONL
 * file or another client. `parseLayout` turns it into a `LayoutObject`.
 */
export const RawLayoutRecord = z
  .object({
    id: z.number().int().optional(),
    kind: z.string().optional(),
    obj: z.string().optional(),
    type: z.string().optional(),
    page: z.number().int().optional(),
    x: z.number().int().optional(),
    y: z.number().int().optional(),
    w: z.number().int().optional(),
    h: z.number().int().optional(),
    width: z.number().int().optional(),
    height: z.number().int().optional(),
    entityRef: z.string().optional(),
    entity_ref: z.string().optional(),
    entity: z.string().optional(),
    entity_id: z.string().optional(),
    entityId: z.string().optional(),
  })
  .openapi('LayoutRecord')
export type RawLayoutRecordType = z.infer<typeof RawLayoutRecord>

export const RawLayout = z.array(RawLayoutRecord).openapi('Layout')
