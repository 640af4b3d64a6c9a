import type { RequestHandler } from 'express'
import { validateCoordinates } from '@plate-designer/geometry'
import { ValidateSchemas } from '../../../schemas/index.js'

export function handleValidateCoordinates(): RequestHandler {
  return (req, res) => {
    const { x, y, w, h, deviceWidth, deviceHeight } =
      req.body as ValidateSchemas.ValidateCoordinatesRequestType
    const check = validateCoordinates(x, y, w, h, deviceWidth, deviceHeight)
    const data: ValidateSchemas.CheckResultType = check.valid
      ? { valid: true }
      : { valid: false, error: check.message }

    res.status(200).json({ success: true, data })
  }
}
