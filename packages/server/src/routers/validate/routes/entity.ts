import type { RequestHandler } from 'express'
import type { Logger } from '@plate-designer/logger'
import type { EntityExistenceChecker } from '@plate-designer/validation'
import { ValidateSchemas } from '../../../schemas/index.js'

export function handleValidateEntity(
  checker: EntityExistenceChecker,
  logger: Logger,
): RequestHandler {
  return async (req, res, next) => {
    try {
      const { entityRef } = req.body as ValidateSchemas.ValidateEntityRequestType
      const outcome = await checker.exists(entityRef)

      let data: ValidateSchemas.CheckResultType
      switch (outcome.status) {
        case 'exists':
          data = { valid: true }
          break
        case 'missing':
          data = { valid: false, error: `Entity '${entityRef}' does not exist` }
          break
        case 'unavailable':
          logger.warn(`could not verify entity ${entityRef}: ${outcome.error}`)
          data = { valid: false, error: `Could not verify entity '${entityRef}': ${outcome.error}` }
          break
      }

      return res.status(200).json({ success: true, data })
    } catch (err) {
      return next(err)
    }
  }
}
