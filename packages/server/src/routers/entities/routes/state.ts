import type { RequestHandler } from 'express'
import type { EntityCatalog } from '@plate-designer/home-assistant'
import type { Logger } from '@plate-designer/logger'
import { errorMessage, runWithConcurrency, VALIDATION_CONSTANTS } from '@plate-designer/utils'
import { EntitySchemas } from '../../../schemas/index.js'

const UNAVAILABLE: EntitySchemas.EntityStateSummaryType = {
  state: 'unavailable',
  attributes: {},
  available: false,
}

export function handleGetState(catalog: EntityCatalog): RequestHandler {
  return async (req, res, next) => {
    try {
      const entityId = req.params.entityId ?? ''
      const record = await catalog.getState(entityId)
      if (!record) {
        return res.status(404).json({ success: false, message: `Entity ${entityId} not found` })
      }

      const data: EntitySchemas.EntityStateType = {
        entityId: record.entity_id,
        state: record.state,
        attributes: record.attributes,
        lastChanged: record.last_changed,
        lastUpdated: record.last_updated,
      }
      return res.status(200).json({ success: true, data })
    } catch (err) {
      return next(err)
    }
  }
}

/** Unknown entities and failed lookups are reported per entity as unavailable. */
export function handleGetStates(catalog: EntityCatalog, logger: Logger): RequestHandler {
  return async (req, res, next) => {
    try {
      const { entityIds } = req.body as EntitySchemas.EntityStatesRequestType
      const summaries = new Map<string, EntitySchemas.EntityStateSummaryType>()

      await runWithConcurrency(
        [...new Set(entityIds)],
        VALIDATION_CONSTANTS.ENTITY_CHECK_CONCURRENCY,
        async (entityId) => {
          try {
            const record = await catalog.getState(entityId)
            summaries.set(
              entityId,
              record
                ? { state: record.state, attributes: record.attributes, available: true }
                : UNAVAILABLE,
            )
          } catch (err) {
            logger.debug(`entity ${entityId} unavailable: ${errorMessage(err)}`)
            summaries.set(entityId, UNAVAILABLE)
          }
        },
      )

      const data: Record<string, EntitySchemas.EntityStateSummaryType> = {}
      for (const entityId of entityIds) {
        data[entityId] = summaries.get(entityId) ?? UNAVAILABLE
      }
      return res.status(200).json({ success: true, data })
    } catch (err) {
      return next(err)
    }
  }
}
