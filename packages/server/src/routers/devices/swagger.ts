import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { z } from 'zod'
import { DeviceRecord, ResolutionEntry } from '@plate-designer/devices'
import { CommonSchemas } from '../../schemas/index.js'

export const DEVICES = 'Devices'
export const basePath = '/api/devices'

export const listDevices: RouteConfig = {
  method: 'get',
  path: basePath,
  tags: [DEVICES],
  summary: 'List discovered display plates',
  description: `
Runs device discovery over the current Home Assistant state snapshot.

Each call re-reads the snapshot; nothing is cached between calls.
  `.trim(),
  responses: {
    200: {
      description: 'Discovered devices, sorted by device id',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: z.array(DeviceRecord) }),
        },
      },
    },
    502: {
      description: 'Home Assistant could not be reached',
      content: { 'application/json': { schema: CommonSchemas.StandardResponse } },
    },
  },
}

export const listResolutions: RouteConfig = {
  method: 'get',
  path: `${basePath}/resolutions`,
  tags: [DEVICES],
  summary: 'Known screen resolutions by model key',
  responses: {
    200: {
      description: 'The full resolution table',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({
            data: z.record(z.string(), ResolutionEntry),
          }),
        },
      },
    },
  },
}

export const getResolution: RouteConfig = {
  method: 'get',
  path: `${basePath}/resolutions/{modelKey}`,
  tags: [DEVICES],
  summary: 'Screen resolution of one model',
  request: {
    params: z.object({ modelKey: z.string().openapi({ example: 'lanbon_l8' }) }),
  },
  responses: {
    200: {
      description: 'Resolution entry',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: ResolutionEntry }),
        },
      },
    },
    404: {
      description: 'Unknown model key',
      content: { 'application/json': { schema: CommonSchemas.StandardResponse } },
    },
  },
}

export const doc: RouteConfig[] = [listDevices, listResolutions, getResolution]
