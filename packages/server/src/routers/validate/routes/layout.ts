import type { RequestHandler } from 'express'
import type { ValidationOrchestrator } from '@plate-designer/validation'
import { ValidateSchemas } from '../../../schemas/index.js'

export function handleValidateLayout(orchestrator: ValidationOrchestrator): RequestHandler {
  return async (req, res, next) => {
    try {
      const payload = req.body as ValidateSchemas.ValidateLayoutRequestType
      const result = await orchestrator.validate(payload.layout, payload.deviceId, payload.options)
      return res.status(200).json({ success: true, data: result })
    } catch (err) {
      return next(err)
    }
  }
}
