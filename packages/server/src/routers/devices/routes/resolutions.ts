import type { RequestHandler } from 'express'
import { getDeviceResolution, listDeviceResolutions } from '@plate-designer/devices'

export function handleListResolutions(): RequestHandler {
  return (_req, res) => {
    res.status(200).json({ success: true, data: listDeviceResolutions() })
  }
}

export function handleGetResolution(): RequestHandler {
  return (req, res) => {
    const modelKey = req.params.modelKey ?? ''
    const entry = getDeviceResolution(modelKey)
    if (!entry) {
      res.status(404).json({ success: false, message: `Unknown model key '${modelKey}'` })
      return
    }
    res.status(200).json({ success: true, data: entry })
  }
}
