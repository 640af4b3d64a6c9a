import { z } from 'zod'
import {
  DEFAULT_PAGE,
  KIND_ALIASES,
  LAYOUT_KINDS,
  RawLayoutRecord,
  type Layout,
  type LayoutKind,
  type LayoutObject,
  type RawLayoutRecordType,
} from './types.js'

export interface LayoutIssue {
  path: string
  message: string
  code: string
}

export class LayoutParseError extends Error {
  constructor(readonly issues: LayoutIssue[]) {
    super(`Invalid layout: ${issues.map((i) => `${i.path || '<root>'}: ${i.message}`).join('; ')}`)
    this.name = 'LayoutParseError'
  }
}

const isLayoutKind = (value: string): value is LayoutKind =>
  (LAYOUT_KINDS as readonly string[]).includes(value)

export function normalizeKind(raw: string | undefined): LayoutKind | undefined {
  if (raw === undefined) return undefined
  const lowered = raw.trim().toLowerCase()
  const aliased = KIND_ALIASES[lowered] ?? lowered
  return isLayoutKind(aliased) ? aliased : undefined
}

function pickEntityRef(raw: RawLayoutRecordType): string | undefined {
  const candidates = [raw.entityRef, raw.entity_ref, raw.entity, raw.entity_id, raw.entityId]
  for (const candidate of candidates) {
    const trimmed = candidate?.trim()
    if (trimmed) return trimmed
  }
  return undefined
}

export const LayoutRecord = RawLayoutRecord.transform((raw, ctx): LayoutObject => {
  const spelled = raw.kind ?? raw.obj ?? raw.type
  const kind = normalizeKind(spelled)
  if (!kind) {
    ctx.addIssue({
      code: 'custom',
      path: ['kind'],
      message:
        spelled === undefined
          ? 'Object kind is required (kind, obj or type)'
          : `Unknown object kind '${spelled}'`,
    })
    return z.NEVER
  }

  const page = raw.page ?? DEFAULT_PAGE
  if (kind === 'page') {
    return { kind, id: raw.id, page }
  }

  return {
    kind,
    id: raw.id,
    page,
    x: raw.x ?? 0,
    y: raw.y ?? 0,
    w: raw.w ?? raw.width ?? 0,
    h: raw.h ?? raw.height ?? 0,
    entityRef: pickEntityRef(raw),
  }
})

export const LayoutSchema = z.array(LayoutRecord)

export function toLayoutIssues(error: z.ZodError): LayoutIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }))
}

export type LayoutParseResult =
  | { success: true; layout: Layout }
  | { success: false; issues: LayoutIssue[] }

export function safeParseLayout(input: unknown): LayoutParseResult {
  const result = LayoutSchema.safeParse(input)
  if (!result.success) {
    return { success: false, issues: toLayoutIssues(result.error) }
  }
  return { success: true, layout: result.data }
}

/** Ingests raw records once; every stage downstream works on the typed union. */
export function parseLayout(input: unknown): Layout {
  const result = safeParseLayout(input)
  if (!result.success) {
    throw new LayoutParseError(result.issues)
  }
  return result.layout
}
