import type { ErrorRequestHandler, RequestHandler } from 'express'
import { HomeAssistantError } from '@plate-designer/home-assistant'
import type { Logger } from '@plate-designer/logger'
import { errorMessage } from '@plate-designer/utils'

export function notFound(): RequestHandler {
  return (req, res) => {
    res.status(404).json({ success: false, message: `Cannot ${req.method} ${req.path}` })
  }
}

// body-parser and http-errors carry the intended status on the error
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined
  const { status } = err
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined
}

export function handleErrors(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err)

    // body-parser reports malformed JSON as a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, message: 'Malformed JSON body' })
      return
    }

    const message = errorMessage(err)
    if (err instanceof HomeAssistantError) {
      logger.error(`upstream failure on ${req.method} ${req.path}: ${message}`)
      res.status(502).json({ success: false, message })
      return
    }

    const status = clientErrorStatus(err)
    if (status !== undefined) {
      logger.warn(`rejected ${req.method} ${req.path} with ${status}: ${message}`)
      res.status(status).json({ success: false, message })
      return
    }

    logger.error(`unhandled failure on ${req.method} ${req.path}: ${message}`)
    res.status(500).json({ success: false, message })
  }
}
