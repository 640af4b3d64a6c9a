import { OpenAPIRegistry, OpenApiGeneratorV3, type RouteConfig } from '@asteasolutions/zod-to-openapi'

import { DevicesRouter, EntitiesRouter, StatusRouter, ValidateRouter } from '../routers/index.js'

const registry = new OpenAPIRegistry()

const allDocs: RouteConfig[] = [
  ...StatusRouter.doc,
  ...DevicesRouter.doc,
  ...EntitiesRouter.doc,
  ...ValidateRouter.doc,
]

for (const element of allDocs) {
  registry.registerPath(element)
}

const generator = new OpenApiGeneratorV3(registry.definitions)

export const openapiDoc = generator.generateDocument({
  openapi: '3.0.0',
  info: {
    title: 'Plate Designer API',
    version: '0.1.0',
    description: 'Layout validation and device discovery for openHASP display plates.',
  },
})
