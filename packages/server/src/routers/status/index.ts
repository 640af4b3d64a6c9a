import { Router } from 'express'

export { basePath, doc } from './swagger.js'

export function create(): Router {
  const router = Router()
  router.get('/', (_req, res) => {
    res.status(200).json({ success: true, data: { status: 'ok' } })
  })
  return router
}
