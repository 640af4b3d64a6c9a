import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { LayoutSchema, RawLayout } from '@plate-designer/layout'
import { ValidationOptions } from '@plate-designer/validation'
extendZodWithOpenApi(z)

export const ValidateLayoutRequest = z.object({
  layout: LayoutSchema,
  deviceId: z.string().min(1),
  options: ValidationOptions.optional(),
})
export type ValidateLayoutRequestType = z.infer<typeof ValidateLayoutRequest>

// Wire shape of the same request, as documented: records before ingestion.
export const ValidateLayoutBody = z
  .object({
    layout: RawLayout,
    deviceId: z.string().min(1).openapi({ example: 'plate_kitchen' }),
    options: ValidationOptions.optional(),
  })
  .openapi('ValidateLayoutRequest')

export const ValidateEntityRequest = z
  .object({
    entityRef: z.string().min(1).openapi({ example: 'light.kitchen' }),
  })
  .openapi('ValidateEntityRequest')
export type ValidateEntityRequestType = z.infer<typeof ValidateEntityRequest>

export const ValidateCoordinatesRequest = z
  .object({
    x: z.number().int(),
    y: z.number().int(),
    w: z.number().int(),
    h: z.number().int(),
    deviceWidth: z.number().int().positive(),
    deviceHeight: z.number().int().positive(),
  })
  .openapi('ValidateCoordinatesRequest')
export type ValidateCoordinatesRequestType = z.infer<typeof ValidateCoordinatesRequest>

export const CheckResult = z
  .object({
    valid: z.boolean(),
    error: z.string().optional(),
  })
  .openapi('CheckResult')
export type CheckResultType = z.infer<typeof CheckResult>
