import type { RequestHandler } from 'express'
import type { DeviceRegistry } from '@plate-designer/devices'

export function handleListDevices(registry: DeviceRegistry): RequestHandler {
  return async (_req, res, next) => {
    try {
      const devices = await registry.listDevices()
      return res.status(200).json({ success: true, data: devices })
    } catch (err) {
      return next(err)
    }
  }
}
