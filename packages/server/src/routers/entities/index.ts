import { Router } from 'express'
import type { EntityCatalog } from '@plate-designer/home-assistant'
import type { Logger } from '@plate-designer/logger'
import { validateBody } from '../../middlewares/index.js'
import { EntitySchemas } from '../../schemas/index.js'
import { handleListEntities } from './routes/list.js'
import { handleGetState, handleGetStates } from './routes/state.js'

export { basePath, doc } from './swagger.js'

export function create(catalog: EntityCatalog, logger: Logger): Router {
  const router = Router()
  router.get('/', handleListEntities(catalog, logger))
  router.get('/:entityId/state', handleGetState(catalog))
  router.post(
    '/states',
    validateBody(EntitySchemas.EntityStatesRequest),
    handleGetStates(catalog, logger),
  )
  return router
}
