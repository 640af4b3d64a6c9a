import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { z } from 'zod'
import { CommonSchemas } from '../../schemas/index.js'

export const STATUS = 'Status'
export const basePath = '/api/status'

export const status: RouteConfig = {
  method: 'get',
  path: basePath,
  tags: [STATUS],
  summary: 'Liveness check',
  responses: {
    200: {
      description: 'Server is up',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({
            data: z.object({ status: z.literal('ok') }),
          }),
        },
      },
    },
  },
}

export const doc: RouteConfig[] = [status]
