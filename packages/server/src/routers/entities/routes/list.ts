import type { RequestHandler } from 'express'
import type { EntityCatalog } from '@plate-designer/home-assistant'
import type { Logger } from '@plate-designer/logger'
import { rejectInvalid, toIssues } from '../../../middlewares/index.js'
import { EntitySchemas } from '../../../schemas/index.js'

export function handleListEntities(catalog: EntityCatalog, logger: Logger): RequestHandler {
  return async (req, res, next) => {
    const query = EntitySchemas.EntityQuery.safeParse(req.query)
    if (!query.success) {
      return rejectInvalid(res, toIssues(query.error))
    }

    try {
      const entities = await catalog.listEntities(query.data)
      logger.debug(`listed ${entities.length} entities`, { ...query.data })
      return res.status(200).json({ success: true, data: entities })
    } catch (err) {
      return next(err)
    }
  }
}
