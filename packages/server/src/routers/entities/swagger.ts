import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { z } from 'zod'
import { CommonSchemas, EntitySchemas } from '../../schemas/index.js'

export const ENTITIES = 'Entities'
export const basePath = '/api/entities'

export const listEntities: RouteConfig = {
  method: 'get',
  path: basePath,
  tags: [ENTITIES],
  summary: 'Browse Home Assistant entities',
  description:
    'Lists entities with their friendly name, domain and icon. `domain` keeps one domain; `search` matches ids and friendly names, ignoring case.',
  request: { query: EntitySchemas.EntityQuery },
  responses: {
    200: {
      description: 'Matching entities',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: z.array(EntitySchemas.Entity) }),
        },
      },
    },
    400: {
      description: 'Query validation failed',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
    502: {
      description: 'Home Assistant could not be reached',
      content: { 'application/json': { schema: CommonSchemas.StandardResponse } },
    },
  },
}

export const getEntityState: RouteConfig = {
  method: 'get',
  path: `${basePath}/{entityId}/state`,
  tags: [ENTITIES],
  summary: 'Current state of one entity',
  request: { params: EntitySchemas.EntityStateParams },
  responses: {
    200: {
      description: 'State, attributes and timestamps',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({ data: EntitySchemas.EntityState }),
        },
      },
    },
    404: {
      description: 'Home Assistant does not know the entity',
      content: { 'application/json': { schema: CommonSchemas.StandardResponse } },
    },
    502: {
      description: 'Home Assistant could not be reached',
      content: { 'application/json': { schema: CommonSchemas.StandardResponse } },
    },
  },
}

export const getEntityStates: RouteConfig = {
  method: 'post',
  path: `${basePath}/states`,
  tags: [ENTITIES],
  summary: 'Current states of several entities',
  description:
    'Keyed by entity id in request order. An entity that is unknown or cannot be read is reported with `available: false`.',
  request: {
    body: {
      content: {
        'application/json': { schema: EntitySchemas.EntityStatesRequest },
      },
    },
  },
  responses: {
    200: {
      description: 'One summary per requested entity',
      content: {
        'application/json': {
          schema: CommonSchemas.StandardResponse.extend({
            data: z.record(z.string(), EntitySchemas.EntityStateSummary),
          }),
        },
      },
    },
    400: {
      description: 'Request validation failed',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
  },
}

export const doc: RouteConfig[] = [listEntities, getEntityState, getEntityStates]
