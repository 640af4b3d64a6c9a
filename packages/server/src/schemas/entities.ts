import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const EntityQuery = z.object({
  domain: z.string().min(1).optional().openapi({ example: 'light' }),
  search: z.string().optional().openapi({ example: 'kitchen' }),
})
export type EntityQueryType = z.infer<typeof EntityQuery>

export const Entity = z
  .object({
    entityId: z.string(),
    state: z.string(),
    friendlyName: z.string(),
    domain: z.string(),
    icon: z.string(),
    attributes: z.record(z.string(), z.unknown()),
  })
  .openapi('Entity')

export const EntityStateParams = z.object({
  entityId: z.string().min(1).openapi({ example: 'light.kitchen' }),
})

export const EntityState = z
  .object({
    entityId: z.string(),
    state: z.string(),
    attributes: z.record(z.string(), z.unknown()),
    lastChanged: z.string().optional(),
    lastUpdated: z.string().optional(),
  })
  .openapi('EntityState')
export type EntityStateType = z.infer<typeof EntityState>

export const EntityStatesRequest = z
  .object({
    entityIds: z
      .array(z.string().min(1))
      .min(1)
      .max(200)
      .openapi({ example: ['light.kitchen', 'switch.kettle'] }),
  })
  .openapi('EntityStatesRequest')
export type EntityStatesRequestType = z.infer<typeof EntityStatesRequest>

export const EntityStateSummary = z
  .object({
    state: z.string(),
    attributes: z.record(z.string(), z.unknown()),
    available: z.boolean(),
  })
  .openapi('EntityStateSummary')
export type EntityStateSummaryType = z.infer<typeof EntityStateSummary>
