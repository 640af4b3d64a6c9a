import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const ValidationErrorKind = z.enum(['device', 'entity', 'coordinate', 'object_id'])
export type ValidationErrorKindType = z.infer<typeof ValidationErrorKind>

export const ValidationWarningKind = z.enum(['overlap', 'entity'])
export type ValidationWarningKindType = z.infer<typeof ValidationWarningKind>

export const ValidationError = z
  .object({
    kind: ValidationErrorKind,
    message: z.string(),
    objectId: z.number().int().optional(),
    entityRef: z.string().optional(),
    page: z.number().int().optional(),
  })
  .openapi('ValidationError')
export type ValidationErrorType = z.infer<typeof ValidationError>

export const ValidationWarning = z
  .object({
    kind: ValidationWarningKind,
    message: z.string(),
    objectId: z.number().int().optional(),
    entityRef: z.string().optional(),
  })
  .openapi('ValidationWarning')
export type ValidationWarningType = z.infer<typeof ValidationWarning>

export const ValidationResult = z
  .object({
    passed: z.boolean(),
    errors: z.array(ValidationError),
    warnings: z.array(ValidationWarning),
  })
  .openapi('ValidationResult')
export type ValidationResultType = z.infer<typeof ValidationResult>

export const ValidationOptions = z
  .object({
    checkEntities: z.boolean().default(true),
    checkBounds: z.boolean().default(true),
    checkDevice: z.boolean().default(true),
    checkObjectIds: z.boolean().default(true),
    checkOverlaps: z.boolean().default(false),
    suppressWarnings: z.boolean().default(false),
  })
  .openapi('ValidationOptions')
export type ValidationOptionsType = z.infer<typeof ValidationOptions>
export type ValidationOptionsInput = z.input<typeof ValidationOptions>

export interface StageOutput {
  errors: ValidationErrorType[]
  warnings: ValidationWarningType[]
}

/**
 * Outcome of one existence check. `unavailable` covers every failure to get a
 * definite answer, so it can never be mistaken for `missing`.
 */
export type EntityCheckOutcome =
  | { status: 'exists' }
  | { status: 'missing' }
  | { status: 'unavailable'; error: string }

export interface EntityExistenceChecker {
  exists(entityRef: string): Promise<EntityCheckOutcome>
}
