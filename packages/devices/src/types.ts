import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const Resolution = z
  .object({ width: z.number().int().positive(), height: z.number().int().positive() })
  .openapi('Resolution')
export type ResolutionType = z.infer<typeof Resolution>

export const DeviceRecord = z
  .object({
    deviceId: z.string().min(1),
    displayName: z.string(),
    model: z.string(),
    modelKey: z.string().optional(),
    online: z.boolean(),
    resolution: Resolution.optional(),
    entityRefs: z.array(z.string()).min(1).openapi({ description: 'Entities that belong to this device' }),
  })
  .openapi('DeviceRecord')
export type DeviceRecordType = z.infer<typeof DeviceRecord>

/** One entry of the external system's state snapshot, in its own wire shape. */
export const StateRecord = z
  .object({
    entity_id: z.string(),
    state: z.string().catch('unknown'),
    attributes: z.record(z.string(), z.unknown()).catch({}),
    last_changed: z.string().optional().catch(undefined),
    last_updated: z.string().optional().catch(undefined),
  })
  .openapi('StateRecord')
export type StateRecordType = z.infer<typeof StateRecord>
