import { Router } from 'express'
import type { DeviceRegistry } from '@plate-designer/devices'
import { handleListDevices } from './routes/list.js'
import { handleGetResolution, handleListResolutions } from './routes/resolutions.js'

export { basePath, doc } from './swagger.js'

export function create(registry: DeviceRegistry): Router {
  const router = Router()
  router.get('/', handleListDevices(registry))
  router.get('/resolutions', handleListResolutions())
  router.get('/resolutions/:modelKey', handleGetResolution())
  return router
}
