import type { Request, Response, NextFunction, RequestHandler } from 'express'
import type { z } from 'zod'
import { makeLogger } from '@plate-designer/logger'
import type { IssueSchemaType } from '../schemas/common.js'

const logger = makeLogger('validate-middleware')

export type BodyOf<T extends z.ZodType> = z.infer<T>

export function toIssues(error: z.ZodError): IssueSchemaType[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }))
}

export function rejectInvalid(res: Response, issues: IssueSchemaType[]): Response {
  logger.warn('invalid payload found', { issues })
  return res.status(400).json({
    status: false,
    error: 'ValidationError',
    issues,
  })
}

export function validateBody<T extends z.ZodType>(schema: T): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body)

    if (!result.success) {
      return rejectInvalid(res, toIssues(result.error))
    }

    // parsed & validated
    req.body = result.data
    return next()
  }
}
