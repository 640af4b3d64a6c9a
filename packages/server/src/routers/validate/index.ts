import { Router } from 'express'
import type { Logger } from '@plate-designer/logger'
import type { EntityExistenceChecker, ValidationOrchestrator } from '@plate-designer/validation'
import { validateBody } from '../../middlewares/index.js'
import { ValidateSchemas } from '../../schemas/index.js'
import { handleValidateCoordinates } from './routes/coordinates.js'
import { handleValidateEntity } from './routes/entity.js'
import { handleValidateLayout } from './routes/layout.js'

export { basePath, doc } from './swagger.js'

export function create(
  orchestrator: ValidationOrchestrator,
  checker: EntityExistenceChecker,
  logger: Logger,
): Router {
  const router = Router()

  router.post(
    '/',
    validateBody(ValidateSchemas.ValidateLayoutRequest),
    handleValidateLayout(orchestrator),
  )

  router.post(
    '/entity',
    validateBody(ValidateSchemas.ValidateEntityRequest),
    handleValidateEntity(checker, logger),
  )

  router.post(
    '/coordinates',
    validateBody(ValidateSchemas.ValidateCoordinatesRequest),
    handleValidateCoordinates(),
  )

  return router
}
