import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const StandardResponse = z
  .object({
    success: z.boolean(),
    message: z.string().optional(),
    data: z.unknown().optional(),
  })
  .openapi('StandardResponse')

export const IssueSchema = z
  .object({
    path: z.string(),
    message: z.string(),
    code: z.string(),
  })
  .openapi('Issue')
export type IssueSchemaType = z.infer<typeof IssueSchema>

export const ValidationError = z
  .object({
    status: z.literal(false),
    error: z.literal('ValidationError'),
    issues: z.array(IssueSchema),
  })
  .openapi('RequestValidationError')
