import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { ValidationResult } from '@plate-designer/validation'
import { CommonSchemas, ValidateSchemas } from '../../schemas/index.js'

export const VALIDATION = 'Validation'
export const basePath = '/api/validate'

export const validateLayout: RouteConfig = {
  method: 'post',
  path: basePath,
  tags: [VALIDATION],
  summary: 'Validate a layout against a target device',
  description: `
Runs the validation pipeline: device check first, then entity references,
coordinates, object ids and (when enabled) overlaps.

A failed device check stops validation and is the only error reported.
Findings come back as data with HTTP 200; \`passed\` is false when any error was found.
  `.trim(),
  request: {
    body: {
      content: {
        'application/json': { schema: ValidateSchemas.ValidateLayoutBody },
      },
    },
  },
  responses: {
    200: {
      description: 'Validation result',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: ValidationResult }),
        },
      },
    },
    400: {
      description: 'Request or layout could not be parsed',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
  },
}

export const validateEntity: RouteConfig = {
  method: 'post',
  path: `${basePath}/entity`,
  tags: [VALIDATION],
  summary: 'Check that one entity exists',
  request: {
    body: {
      content: {
        'application/json': { schema: ValidateSchemas.ValidateEntityRequest },
      },
    },
  },
  responses: {
    200: {
      description: 'Outcome of the existence check',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: ValidateSchemas.CheckResult }),
        },
      },
    },
    400: {
      description: 'Request validation failed',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
  },
}

export const validateCoordinates: RouteConfig = {
  method: 'post',
  path: `${basePath}/coordinates`,
  tags: [VALIDATION],
  summary: 'Check that one rectangle fits on screen',
  request: {
    body: {
      content: {
        'application/json': { schema: ValidateSchemas.ValidateCoordinatesRequest },
      },
    },
  },
  responses: {
    200: {
      description: 'Outcome of the bounds check',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: ValidateSchemas.CheckResult }),
        },
      },
    },
    400: {
      description: 'Request validation failed',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
  },
}

export const doc: RouteConfig[] = [validateLayout, validateEntity, validateCoordinates]
