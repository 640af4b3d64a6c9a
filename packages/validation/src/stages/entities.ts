import type { Widget } from '@plate-designer/layout'
import { makeLogger, type Logger } from '@plate-designer/logger'
import {
  errorMessage,
  runWithConcurrency,
  withTimeout,
  VALIDATION_CONSTANTS,
} from '@plate-designer/utils'
import type {
  EntityCheckOutcome,
  EntityExistenceChecker,
  StageOutput,
  ValidationErrorType,
  ValidationWarningType,
} from '../types.js'
import { describeId } from './describe.js'

export interface EntityReferenceValidatorOptions {
  timeoutMs?: number
  concurrency?: number
}

interface Reference {
  entityRef: string
  users: Widget[]
}

/** Distinct references in first-appearance order, each with every widget using it. */
export function collectReferences(widgets: readonly Widget[]): Reference[] {
  const byRef = new Map<string, Reference>()
  for (const widget of widgets) {
    if (!widget.entityRef) continue
    const ref = byRef.get(widget.entityRef)
    if (ref) ref.users.push(widget)
    else byRef.set(widget.entityRef, { entityRef: widget.entityRef, users: [widget] })
  }
  return [...byRef.values()]
}

export class EntityReferenceValidator {
  private readonly logger: Logger = makeLogger('EntityReferenceValidator')
  private readonly timeoutMs: number
  private readonly concurrency: number

  constructor(
    private readonly checker: EntityExistenceChecker,
    options: EntityReferenceValidatorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? VALIDATION_CONSTANTS.ENTITY_CHECK_TIMEOUT_MS
    this.concurrency = options.concurrency ?? VALIDATION_CONSTANTS.ENTITY_CHECK_CONCURRENCY
  }

  /**
   * One existence check per distinct reference. A reference that cannot be
   * checked yields a warning instead of errors; only confirmed absence fails.
   */
  async validate(widgets: readonly Widget[]): Promise<StageOutput> {
    const references = collectReferences(widgets)
    const outcomes = new Map<string, EntityCheckOutcome>()

    await runWithConcurrency(references, this.concurrency, async ({ entityRef }) => {
      outcomes.set(entityRef, await this.check(entityRef))
    })

    const errors: ValidationErrorType[] = []
    const warnings: ValidationWarningType[] = []

    for (const { entityRef, users } of references) {
      const outcome = outcomes.get(entityRef)
      if (!outcome || outcome.status === 'exists') continue

      if (outcome.status === 'unavailable') {
        warnings.push({
          kind: 'entity',
          message: `Could not verify entity '${entityRef}': ${outcome.error}`,
          entityRef,
        })
        continue
      }

      for (const widget of users) {
        errors.push({
          kind: 'entity',
          message: `Object ${describeId(widget.id)} references entity '${entityRef}', which does not exist`,
          objectId: widget.id,
          entityRef,
          page: widget.page,
        })
      }
    }

    this.logger.debug('entity references checked', {
      references: references.length,
      errors: errors.length,
      unverified: warnings.length,
    })
    return { errors, warnings }
  }

  private async check(entityRef: string): Promise<EntityCheckOutcome> {
    try {
      return await withTimeout(
        this.checker.exists(entityRef),
        this.timeoutMs,
        `existence check for ${entityRef}`,
      )
    } catch (err) {
      const error = errorMessage(err)
      this.logger.warn('entity existence check unavailable', { entityRef, error })
      return { status: 'unavailable', error }
    }
  }
}
